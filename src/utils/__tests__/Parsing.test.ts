import { describe, test, expect } from 'vitest';

import { formatIsoDate, isBlank, parseIsoDate, parseNumber, parseTransactionDate } from '../Parsing.ts';

describe('parseTransactionDate', () => {
    test('accepts both formats for the same day', () => {
        const expected = new Date(Date.UTC(2024, 1, 21));

        expect(parseTransactionDate('2024-02-21')).toEqual(expected);
        expect(parseTransactionDate('21/02/2024')).toEqual(expected);
        expect(parseTransactionDate(' 21/02/2024 ')).toEqual(expected);
    });

    test('leap days', () => {
        expect(parseTransactionDate('29/02/2024')).toEqual(new Date(Date.UTC(2024, 1, 29)));
        expect(parseTransactionDate('29/02/2023')).toBeNull();
    });

    test.each(['2024-02-30', '2024-00-10', '32/01/2024', '01/13/2024', '2024.02.21', '20240221', ''])(
        'rejects %j',
        (text) => {
            expect(parseTransactionDate(text)).toBeNull();
        }
    );

    test('ISO parser does not take the day-first format', () => {
        expect(parseIsoDate('21/02/2024')).toBeNull();
    });
});

describe('formatIsoDate', () => {
    test('zero-pads month and day', () => {
        expect(formatIsoDate(new Date(Date.UTC(2024, 0, 5)))).toBe('2024-01-05');
    });
});

describe('parseNumber', () => {
    test.each([
        ['1000', 1000],
        ['1000.00', 1000],
        [' 5239.52 ', 5239.52],
        ['-1', -1],
        ['+2', 2],
        ['.5', 0.5],
        ['1e3', 1000],
    ])('%j → %d', (text, expected) => {
        expect(parseNumber(text)).toBe(expected);
    });

    test.each(['', '  ', 'abc', '12abc', '0x10', 'Infinity', 'NaN', '1,000'])('%j → null', (text) => {
        expect(parseNumber(text)).toBeNull();
    });

    test('absent values', () => {
        expect(parseNumber(null)).toBeNull();
        expect(parseNumber(undefined)).toBeNull();
    });
});

describe('isBlank', () => {
    test('blank and absent values', () => {
        expect(isBlank('')).toBe(true);
        expect(isBlank(' \t')).toBe(true);
        expect(isBlank(null)).toBe(true);
        expect(isBlank(undefined)).toBe(true);
        expect(isBlank(' x ')).toBe(false);
    });
});
