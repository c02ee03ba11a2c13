import { createLogger } from '../utils/Logger.ts';
import { formatIsoDate, isBlank, parseNumber, parseTransactionDate } from '../utils/Parsing.ts';
import { TransactionField } from '../model/Models.ts';

import type { CleanedRecord, ValidatedRecord } from '../model/Models.ts';
import type { Logger } from 'pino';

export const DEFAULT_MERCHANT_CATEGORY = 'Unknown';

const DATE_FIELDS: readonly string[] = [TransactionField.TransactionDate, TransactionField.ValueDate];
const NUMERIC_FIELDS: readonly string[] = [TransactionField.Amount, TransactionField.RiskScore];
const UPPER_CASE_FIELDS: readonly string[] = [
    TransactionField.Currency,
    TransactionField.Direction,
    TransactionField.AccountType,
];

/**
 * Normalizes a validated record. Never throws: a value that cannot be
 * normalized becomes null. Cleaning a cleaned record changes nothing.
 */
export class TransactionCleaner {
    private logger: Logger;

    constructor(logger?: Logger) {
        this.logger = logger ?? createLogger('TransactionCleaner');
    }

    /**
     * Accepts a validated record, or an already cleaned one.
     */
    clean(record: ValidatedRecord | CleanedRecord): CleanedRecord {
        const fields: CleanedRecord = record;
        const transactionId = record[TransactionField.TransactionId];
        this.logger.debug(`Cleaning transaction: ${transactionId}`);

        const cleaned: Record<string, string | null> = {};

        for (const [key, value] of Object.entries(fields)) {
            if (DATE_FIELDS.includes(key)) {
                cleaned[key] = this.normalizeDate(value);
            } else if (NUMERIC_FIELDS.includes(key)) {
                cleaned[key] = this.cleanNumeric(value);
            } else if (UPPER_CASE_FIELDS.includes(key)) {
                cleaned[key] = isBlank(value) ? null : trimWhitespace(value).toUpperCase();
            } else if (key === TransactionField.MerchantCategory) {
                cleaned[key] = cleanMerchantCategory(value);
            } else {
                cleaned[key] = value === null ? null : trimWhitespace(value);
            }
        }

        if (!(TransactionField.MerchantCategory in cleaned)) {
            cleaned[TransactionField.MerchantCategory] = DEFAULT_MERCHANT_CATEGORY;
        }
        if (!(TransactionField.RiskScore in cleaned)) {
            cleaned[TransactionField.RiskScore] = null;
        }

        this.logger.debug(`Cleaning complete for ${transactionId}`);
        return cleaned;
    }

    /**
     * Rewrites YYYY-MM-DD or DD/MM/YYYY into YYYY-MM-DD.
     */
    normalizeDate(value: string | null): string | null {
        if (isBlank(value)) return null;

        const date = parseTransactionDate(trimWhitespace(value));
        if (!date) {
            this.logger.warn(`Could not normalize date: ${value}`);
            return null;
        }
        return formatIsoDate(date);
    }

    /**
     * Returns the number in canonical string form ("1000.00" → "1000"),
     * or null when empty or not numeric.
     */
    cleanNumeric(value: string | null): string | null {
        if (isBlank(value)) return null;

        const parsed = parseNumber(value);
        if (parsed === null) {
            this.logger.warn(`Could not convert to numeric: ${value}`);
            return null;
        }
        return String(parsed);
    }
}

export function trimWhitespace(value: string | null): string {
    return value === null ? '' : value.trim();
}

export function cleanMerchantCategory(value: string | null | undefined): string {
    if (value === undefined || isBlank(value)) {
        return DEFAULT_MERCHANT_CATEGORY;
    }
    return trimWhitespace(value);
}
