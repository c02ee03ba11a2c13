import { describe, test, expect } from 'vitest';

import { TransactionCleaner, cleanMerchantCategory, trimWhitespace } from '../TransactionCleaner.ts';
import type { RawRecord } from '../../model/Models.ts';

const cleaner = new TransactionCleaner();

const VALIDATED: RawRecord = {
    transaction_id: '  TXN0000001  ',
    transaction_date: '21/02/2024',
    value_date: '2024-02-22',
    customer_id: ' CUST00001',
    account_id: 'ACC00001 ',
    account_type: 'savings',
    direction: ' debit ',
    amount: ' 5000.50 ',
    currency: 'idr',
    merchant_category: '  GROCERY  ',
    region: ' JKT ',
    risk_score: '0.10',
};

describe('TransactionCleaner', () => {
    test('normalizes every field of a validated record', () => {
        expect(cleaner.clean(VALIDATED)).toEqual({
            transaction_id: 'TXN0000001',
            transaction_date: '2024-02-21',
            value_date: '2024-02-22',
            customer_id: 'CUST00001',
            account_id: 'ACC00001',
            account_type: 'SAVINGS',
            direction: 'DEBIT',
            amount: '5000.5',
            currency: 'IDR',
            merchant_category: 'GROCERY',
            region: 'JKT',
            risk_score: '0.1',
        });
    });

    test('does not mutate its input', () => {
        const input = { ...VALIDATED };
        cleaner.clean(input);
        expect(input).toEqual(VALIDATED);
    });

    test('is idempotent', () => {
        const once = cleaner.clean(VALIDATED);
        expect(cleaner.clean(once)).toEqual(once);
    });

    test('both accepted date formats give the same canonical date', () => {
        const iso = cleaner.clean({ ...VALIDATED, transaction_date: '2024-02-21' });
        const dayFirst = cleaner.clean({ ...VALIDATED, transaction_date: '21/02/2024' });

        expect(iso.transaction_date).toBe('2024-02-21');
        expect(dayFirst).toEqual(iso);
    });

    test('single-digit day and month are zero-padded', () => {
        expect(cleaner.normalizeDate('1/2/2024')).toBe('2024-02-01');
        expect(cleaner.normalizeDate('2024-2-1')).toBe('2024-02-01');
    });

    test('empty or unparseable dates become null', () => {
        expect(cleaner.normalizeDate('')).toBeNull();
        expect(cleaner.normalizeDate(null)).toBeNull();
        expect(cleaner.normalizeDate('invalid')).toBeNull();
        expect(cleaner.clean({ ...VALIDATED, value_date: '' }).value_date).toBeNull();
    });

    test('numeric fields get a canonical string or null', () => {
        expect(cleaner.cleanNumeric('5000.50')).toBe('5000.5');
        expect(cleaner.cleanNumeric('1000.00')).toBe('1000');
        expect(cleaner.cleanNumeric('1e3')).toBe('1000');
        expect(cleaner.cleanNumeric('')).toBeNull();
        expect(cleaner.cleanNumeric('   ')).toBeNull();
        expect(cleaner.cleanNumeric(null)).toBeNull();
        expect(cleaner.cleanNumeric('abc')).toBeNull();
    });

    test('absent risk score becomes explicit null', () => {
        const { risk_score: _omitted, ...rest } = VALIDATED;
        const cleaned = cleaner.clean(rest);

        expect(cleaned).toHaveProperty('risk_score', null);
    });

    test('empty, blank or absent merchant category defaults to Unknown', () => {
        expect(cleaner.clean({ ...VALIDATED, merchant_category: '' }).merchant_category).toBe('Unknown');
        expect(cleaner.clean({ ...VALIDATED, merchant_category: '   ' }).merchant_category).toBe('Unknown');

        const { merchant_category: _omitted, ...rest } = VALIDATED;
        expect(cleaner.clean(rest).merchant_category).toBe('Unknown');
    });

    test('blank currency, direction and account type become null', () => {
        const cleaned = cleaner.clean({ ...VALIDATED, currency: ' ', direction: '', account_type: '' });

        expect(cleaned.currency).toBeNull();
        expect(cleaned.direction).toBeNull();
        expect(cleaned.account_type).toBeNull();
    });

    test('unknown columns are trimmed and kept', () => {
        expect(cleaner.clean({ ...VALIDATED, channel: '  ATM ' }).channel).toBe('ATM');
    });

    test('no cleaned string has surrounding whitespace', () => {
        for (const value of Object.values(cleaner.clean(VALIDATED))) {
            if (value !== null) {
                expect(value).toBe(value.trim());
            }
        }
    });
});

describe('helpers', () => {
    test('trimWhitespace', () => {
        expect(trimWhitespace('  hello  ')).toBe('hello');
        expect(trimWhitespace('hello')).toBe('hello');
        expect(trimWhitespace(null)).toBe('');
    });

    test('cleanMerchantCategory', () => {
        expect(cleanMerchantCategory('  GROCERY  ')).toBe('GROCERY');
        expect(cleanMerchantCategory(undefined)).toBe('Unknown');
        expect(cleanMerchantCategory(null)).toBe('Unknown');
    });
});
