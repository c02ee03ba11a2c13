import { z } from 'zod';

import { DEFAULT_QUOTE_API_URL } from '../source/QuoteSource.ts';
import { DEFAULT_BACKOFF_MS, DEFAULT_MAX_ATTEMPTS, DEFAULT_TIMEOUT_MS, MAX_TIMER_MS } from '../utils/Retry.ts';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1');

const configSchema = z.object({
    TRANSACTIONS_CSV: z.string().min(1).default('data/banking_transactions.csv'),
    CSV_DELIMITER: z.string().length(1).default(','),
    PREVIEW_LIMIT: z.coerce.number().int().positive().default(5),
    REJECT_INVALID_OPTIONAL_FIELDS: booleanFlag.default('true'),
    QUOTE_API_URL: z.string().url().default(DEFAULT_QUOTE_API_URL),
    QUOTE_SYMBOLS: z
        .string()
        .default('AAPL,GOOGL,MSFT')
        .transform((value) => value.split(',').map((s) => s.trim()).filter((s) => s.length > 0)),
    QUOTE_MAX_ATTEMPTS: z.coerce.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),
    QUOTE_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(DEFAULT_TIMEOUT_MS),
    QUOTE_BACKOFF_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(DEFAULT_BACKOFF_MS),
});

export interface AppConfig {
    transactionsCsv: string;
    csvDelimiter: string;
    previewLimit: number;
    rejectInvalidOptionalFields: boolean;
    quote: {
        apiUrl: string;
        symbols: string[];
        maxAttempts: number;
        timeoutMs: number;
        backoffMs: number;
    };
}

/**
 * Reads the pipeline settings from environment variables.
 * Unset or empty variables take their defaults.
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // treat FOO= the same as an unset FOO
    const defined = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );

    const parsed = configSchema.safeParse(defined);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${problems}`);
    }

    const c = parsed.data;
    return {
        transactionsCsv: c.TRANSACTIONS_CSV,
        csvDelimiter: c.CSV_DELIMITER,
        previewLimit: c.PREVIEW_LIMIT,
        rejectInvalidOptionalFields: c.REJECT_INVALID_OPTIONAL_FIELDS,
        quote: {
            apiUrl: c.QUOTE_API_URL,
            symbols: c.QUOTE_SYMBOLS,
            maxAttempts: c.QUOTE_MAX_ATTEMPTS,
            timeoutMs: c.QUOTE_TIMEOUT_MS,
            backoffMs: c.QUOTE_BACKOFF_MS,
        },
    };
}
