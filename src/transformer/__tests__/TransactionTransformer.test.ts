import { describe, test, expect } from 'vitest';

import {
    TransactionTransformer,
    amountLog,
    isCrossBorder,
    isLargeTransaction,
    transactionDay,
} from '../TransactionTransformer.ts';
import { TransformError } from '../../model/Errors.ts';
import type { CleanedRecord } from '../../model/Models.ts';

// ── Test helpers ──

const CLEANED: CleanedRecord = {
    transaction_id: 'TXN0000001',
    transaction_date: '2024-02-21',
    value_date: '2024-02-22',
    customer_id: 'CUST00001',
    account_id: 'ACC00001',
    account_type: 'SAVINGS',
    txn_type: 'TRANSFER',
    channel: 'MOBILE',
    direction: 'DEBIT',
    amount: '5239.52',
    currency: 'IDR',
    merchant_category: 'GROCERY',
    region: 'JKT',
    risk_score: '0.25',
    is_fraud_suspected: 'false',
};

function withFields(fields: Record<string, string | null>): CleanedRecord {
    return { ...CLEANED, ...fields };
}

const transformer = new TransactionTransformer();

// ── Tests ──

describe('TransactionTransformer', () => {
    test('converts a cleaned record into a typed transaction', () => {
        const t = transformer.transform(CLEANED);

        expect(t.transactionId).toBe('TXN0000001');
        expect(t.transactionDate).toEqual(new Date(Date.UTC(2024, 1, 21)));
        expect(t.valueDate).toEqual(new Date(Date.UTC(2024, 1, 22)));
        expect(t.customerId).toBe('CUST00001');
        expect(t.accountId).toBe('ACC00001');
        expect(t.accountType).toBe('SAVINGS');
        expect(t.direction).toBe('DEBIT');
        expect(t.amount).toBe(5239.52);
        expect(t.currency).toBe('IDR');
        expect(t.merchantCategory).toBe('GROCERY');
        expect(t.riskScore).toBe(0.25);
    });

    test('untyped columns are carried in attributes', () => {
        expect(transformer.transform(CLEANED).attributes).toEqual({
            txn_type: 'TRANSFER',
            channel: 'MOBILE',
            region: 'JKT',
            is_fraud_suspected: 'false',
        });
    });

    test('derives features', () => {
        const t = transformer.transform(CLEANED);

        expect(t.isLargeTransaction).toBe(false);
        expect(t.isCrossBorder).toBe(false);
        expect(t.transactionDay).toBe('Wednesday');
        expect(t.amountLog).toBeCloseTo(Math.log(5239.52), 10);
    });

    test('optional values degrade to null', () => {
        const t = transformer.transform(withFields({ value_date: null, risk_score: null }));

        expect(t.valueDate).toBeNull();
        expect(t.riskScore).toBeNull();
    });

    test('unparseable optional values degrade to null', () => {
        const t = transformer.transform(withFields({ value_date: 'soon', risk_score: 'high' }));

        expect(t.valueDate).toBeNull();
        expect(t.riskScore).toBeNull();
    });

    test('absent account type and direction are null', () => {
        const { account_type: _a, direction: _d, ...rest } = CLEANED;
        const t = transformer.transform(rest);

        expect(t.accountType).toBeNull();
        expect(t.direction).toBeNull();
    });

    test('malformed transaction date → TransformError', () => {
        expect(() => transformer.transform(withFields({ transaction_date: '21/02/2024' }))).toThrow(
            TransformError
        );
        expect(() => transformer.transform(withFields({ transaction_date: null }))).toThrow(
            "Cannot transform mandatory field 'transaction_date' with value ''"
        );
    });

    test('malformed amount → TransformError', () => {
        let caught: unknown;
        try {
            transformer.transform(withFields({ amount: 'abc' }));
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(TransformError);
        if (caught instanceof TransformError) {
            expect(caught.field).toBe('amount');
            expect(caught.value).toBe('abc');
        }
    });

    test('SGD is cross-border, IDR is not', () => {
        expect(transformer.transform(withFields({ currency: 'SGD' })).isCrossBorder).toBe(true);
        expect(transformer.transform(withFields({ currency: 'IDR' })).isCrossBorder).toBe(false);
    });

    test('amount of 6,000,000 is large', () => {
        expect(transformer.transform(withFields({ amount: '6000000' })).isLargeTransaction).toBe(true);
    });
});

describe('derived features', () => {
    test('large transaction threshold is strict', () => {
        expect(isLargeTransaction(5_000_000)).toBe(false);
        expect(isLargeTransaction(5_000_000.01)).toBe(true);
        expect(isLargeTransaction(0)).toBe(false);
    });

    test('cross-border', () => {
        expect(isCrossBorder('USD')).toBe(true);
        expect(isCrossBorder('idr')).toBe(false);
        expect(isCrossBorder('')).toBe(false);
        expect(isCrossBorder('  ')).toBe(false);
    });

    test('weekday name from the UTC date', () => {
        expect(transactionDay(new Date(Date.UTC(2024, 0, 1)))).toBe('Monday');
        expect(transactionDay(new Date(Date.UTC(2024, 0, 7)))).toBe('Sunday');
        expect(transactionDay(new Date(Date.UTC(2024, 0, 6)))).toBe('Saturday');
    });

    test('amount log is null for zero and negative amounts', () => {
        expect(amountLog(0)).toBeNull();
        expect(amountLog(-5)).toBeNull();
        expect(amountLog(1)).toBe(0);
        expect(amountLog(Math.E)).toBeCloseTo(1, 10);
    });
});
