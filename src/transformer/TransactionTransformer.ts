import { createLogger } from '../utils/Logger.ts';
import { isBlank, parseIsoDate, parseNumber } from '../utils/Parsing.ts';
import { TransactionField } from '../model/Models.ts';
import { TransformError } from '../model/Errors.ts';
import { DEFAULT_MERCHANT_CATEGORY } from '../cleaner/TransactionCleaner.ts';

import type { CleanedRecord, TransformedTransaction, Weekday } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Amounts strictly above this are "large". Lower than the validator's
 * anomaly threshold on purpose.
 */
export const LARGE_TRANSACTION_THRESHOLD = 5_000_000;

export const HOME_CURRENCY = 'IDR';

// Date.getUTCDay() order
const WEEKDAYS: readonly Weekday[] = [
    'Sunday',
    'Monday',
    'Tuesday',
    'Wednesday',
    'Thursday',
    'Friday',
    'Saturday',
];

/**
 * Columns mapped onto typed properties; everything else lands in `attributes`.
 */
const TYPED_FIELDS: ReadonlySet<string> = new Set([
    TransactionField.TransactionId,
    TransactionField.TransactionDate,
    TransactionField.ValueDate,
    TransactionField.CustomerId,
    TransactionField.AccountId,
    TransactionField.AccountType,
    TransactionField.Direction,
    TransactionField.Amount,
    TransactionField.Currency,
    TransactionField.MerchantCategory,
    TransactionField.RiskScore,
]);

/**
 * Converts a CleanedRecord into a typed TransformedTransaction and attaches
 * the derived features.
 *
 * Optional fields degrade to null. A mandatory field (transaction date,
 * amount) that is still malformed here means validation was skipped, and
 * raises a TransformError.
 */
export class TransactionTransformer {
    private logger: Logger;

    constructor(logger?: Logger) {
        this.logger = logger ?? createLogger('TransactionTransformer');
    }

    transform(record: CleanedRecord): TransformedTransaction {
        const transactionId = record[TransactionField.TransactionId] ?? '';
        this.logger.debug(`Transforming transaction: ${transactionId}`);

        const transactionDate = this.requireDate(record, TransactionField.TransactionDate);
        const amount = this.requireAmount(record);
        const currency = record[TransactionField.Currency] ?? '';

        const attributes: Record<string, string | null> = {};
        for (const [key, value] of Object.entries(record)) {
            if (!TYPED_FIELDS.has(key)) {
                attributes[key] = value;
            }
        }

        const transformed: TransformedTransaction = {
            transactionId,
            transactionDate,
            valueDate: this.convertOptionalDate(record[TransactionField.ValueDate]),
            customerId: record[TransactionField.CustomerId] ?? '',
            accountId: record[TransactionField.AccountId] ?? '',
            accountType: record[TransactionField.AccountType] ?? null,
            direction: record[TransactionField.Direction] ?? null,
            amount,
            currency,
            merchantCategory: record[TransactionField.MerchantCategory] ?? DEFAULT_MERCHANT_CATEGORY,
            riskScore: this.convertRiskScore(record[TransactionField.RiskScore]),
            attributes,

            isLargeTransaction: isLargeTransaction(amount),
            isCrossBorder: isCrossBorder(currency),
            transactionDay: transactionDay(transactionDate),
            amountLog: amountLog(amount),
        };

        this.logger.debug(
            `Transformation complete for ${transactionId} - ` +
            `Features: large=${transformed.isLargeTransaction}, ` +
            `crossborder=${transformed.isCrossBorder}, ` +
            `day=${transformed.transactionDay}`
        );

        return transformed;
    }

    /**
     * Risk score is optional: anything unparseable becomes null.
     */
    convertRiskScore(value: string | null | undefined): number | null {
        if (isBlank(value)) return null;

        const score = parseNumber(value);
        if (score === null) {
            this.logger.warn(`Could not convert risk score to float: ${value}`);
        }
        return score;
    }

    private convertOptionalDate(value: string | null | undefined): Date | null {
        if (value === null || value === undefined || isBlank(value)) return null;

        const date = parseIsoDate(value);
        if (!date) {
            this.logger.warn(`Could not convert to date object: ${value}`);
        }
        return date;
    }

    private requireDate(record: CleanedRecord, field: string): Date {
        const value = record[field];
        const date = value === null || value === undefined ? null : parseIsoDate(value);
        if (!date) {
            throw this.contractViolation(field, value);
        }
        return date;
    }

    private requireAmount(record: CleanedRecord): number {
        const value = record[TransactionField.Amount];
        const amount = parseNumber(value);
        if (amount === null) {
            throw this.contractViolation(TransactionField.Amount, value);
        }
        return amount;
    }

    private contractViolation(field: string, value: string | null | undefined): TransformError {
        const err = new TransformError(field, value);
        this.logger.error({ field, value }, err.message);
        return err;
    }
}

// ── Derived features: pure functions of converted values ──

export function isLargeTransaction(amount: number): boolean {
    return amount > LARGE_TRANSACTION_THRESHOLD;
}

export function isCrossBorder(currency: string): boolean {
    if (currency.trim() === '') {
        return false;
    }
    return currency.trim().toUpperCase() !== HOME_CURRENCY;
}

export function transactionDay(date: Date): Weekday {
    return WEEKDAYS[date.getUTCDay()];
}

/**
 * Natural log of the amount, null for zero or negative amounts.
 */
export function amountLog(amount: number): number | null {
    return amount > 0 ? Math.log(amount) : null;
}
