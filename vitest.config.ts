import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/__tests__/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        env: {
            LOG_LEVEL: 'silent',
        },
    },
});
