import { createLogger } from '../utils/Logger.ts';
import { isBlank, parseNumber, parseTransactionDate } from '../utils/Parsing.ts';
import { TransactionField } from '../model/Models.ts';
import {
    InvalidAccountTypeError,
    InvalidAmountError,
    InvalidCurrencyError,
    InvalidDateFormatError,
    InvalidDirectionError,
    InvalidTransactionIdError,
} from '../model/Errors.ts';

import type { RawRecord, ValidatedRecord } from '../model/Models.ts';
import type { ValidationError } from '../model/Errors.ts';
import type { Logger } from 'pino';

export const VALID_CURRENCIES = ['IDR', 'USD', 'SGD'] as const;
export const VALID_DIRECTIONS = ['DEBIT', 'CREDIT'] as const;
export const VALID_ACCOUNT_TYPES = ['SAVINGS', 'CURRENT', 'CREDIT_CARD', 'LOAN'] as const;
export const TRANSACTION_ID_PATTERN = /^TXN\d{7}$/;

/**
 * Amounts above this are accepted but flagged for review.
 * Deliberately distinct from the transformer's large-transaction threshold.
 */
export const ANOMALY_THRESHOLD = 10_000_000;

export interface ValidatorOptions {
    /**
     * When false, a present but unknown direction or account type is only
     * logged instead of rejecting the record.
     */
    rejectInvalidOptionalFields?: boolean;
    logger?: Logger;
}

/**
 * Checks a raw record against the business rules, stopping at the first
 * violated rule. Never rewrites the record.
 */
export class TransactionValidator {
    private logger: Logger;
    private rejectInvalidOptionalFields: boolean;

    constructor(options: ValidatorOptions = {}) {
        this.logger = options.logger ?? createLogger('TransactionValidator');
        this.rejectInvalidOptionalFields = options.rejectInvalidOptionalFields ?? true;
    }

    /**
     * @returns the same record object when every rule passes
     * @throws ValidationError subclass for the first failing rule
     */
    validate(record: RawRecord): ValidatedRecord {
        const transactionId = record[TransactionField.TransactionId];
        this.logger.debug(`Validating transaction: ${transactionId}`);

        this.validateTransactionId(transactionId);
        this.validateDate(record[TransactionField.TransactionDate]);
        this.validateAmount(record[TransactionField.Amount]);
        this.validateCurrency(record[TransactionField.Currency]);
        this.validateDirection(record[TransactionField.Direction]);
        this.validateAccountType(record[TransactionField.AccountType]);

        if (this.isAmountAnomaly(record)) {
            this.logger.warn(
                { transactionId, amount: record[TransactionField.Amount] },
                `Amount exceeds anomaly threshold of ${ANOMALY_THRESHOLD}`
            );
        }

        this.logger.debug(`Transaction ${transactionId} validation successful`);
        return record;
    }

    /**
     * True when the amount parses and exceeds ANOMALY_THRESHOLD.
     */
    isAmountAnomaly(record: RawRecord): boolean {
        const amount = parseNumber(record[TransactionField.Amount]);
        return amount !== null && amount > ANOMALY_THRESHOLD;
    }

    validateTransactionId(value: string | undefined): void {
        if (value === undefined || !TRANSACTION_ID_PATTERN.test(value.trim())) {
            this.fail(new InvalidTransactionIdError(value));
        }
    }

    validateDate(value: string | undefined): void {
        if (value === undefined || parseTransactionDate(value) === null) {
            this.fail(new InvalidDateFormatError(value));
        }
    }

    validateAmount(value: string | undefined): void {
        const amount = parseNumber(value);
        if (isBlank(value)) {
            this.fail(new InvalidAmountError(value, 'amount cannot be empty'));
        } else if (amount === null) {
            this.fail(new InvalidAmountError(value, 'amount must be numeric'));
        } else if (amount < 0) {
            this.fail(new InvalidAmountError(value, 'amount cannot be negative'));
        }
    }

    validateCurrency(value: string | undefined): void {
        if (!isMember(VALID_CURRENCIES, value)) {
            this.fail(new InvalidCurrencyError(value, VALID_CURRENCIES));
        }
    }

    validateDirection(value: string | undefined): void {
        if (value === undefined || isBlank(value) || isMember(VALID_DIRECTIONS, value)) return;
        this.failOptional(new InvalidDirectionError(value, VALID_DIRECTIONS));
    }

    validateAccountType(value: string | undefined): void {
        if (value === undefined || isBlank(value) || isMember(VALID_ACCOUNT_TYPES, value)) return;
        this.failOptional(new InvalidAccountTypeError(value, VALID_ACCOUNT_TYPES));
    }

    private fail(err: ValidationError): never {
        this.logger.error({ field: err.field, value: err.value }, err.message);
        throw err;
    }

    private failOptional(err: ValidationError): void {
        if (this.rejectInvalidOptionalFields) {
            this.fail(err);
        }
        this.logger.warn({ field: err.field, value: err.value }, err.message);
    }
}

function isMember(allowed: readonly string[], value: string | undefined): boolean {
    return value !== undefined && allowed.includes(value.trim().toUpperCase());
}
