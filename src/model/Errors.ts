// ── Structural load errors: fatal to the whole source file ──

export type LoadErrorKind =
    | 'source_not_found'
    | 'missing_mandatory_field'
    | 'column_mismatch'
    | 'empty_row'
    | 'malformed_source';

export abstract class LoadError extends Error {
    abstract readonly kind: LoadErrorKind;

    constructor(message: string, readonly source: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class SourceNotFoundError extends LoadError {
    readonly kind = 'source_not_found';

    constructor(source: string, options?: ErrorOptions) {
        super(`Source file not found or not readable: ${source}`, source);
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

export class MissingMandatoryFieldError extends LoadError {
    readonly kind = 'missing_mandatory_field';

    constructor(source: string, readonly missingFields: readonly string[]) {
        super(`Missing mandatory columns in ${source}: ${missingFields.join(', ')}`, source);
    }
}

export class ColumnMismatchError extends LoadError {
    readonly kind = 'column_mismatch';

    /**
     * @param rowNumber 1-based line in the file where the row starts, the header being line 1
     */
    constructor(
        source: string,
        readonly rowNumber: number,
        readonly expected: number,
        readonly actual: number
    ) {
        super(`Row ${rowNumber} of ${source} has ${actual} columns, expected ${expected}`, source);
    }
}

export class EmptyRowError extends LoadError {
    readonly kind = 'empty_row';

    constructor(source: string, readonly rowNumber: number) {
        super(`Empty row detected at row ${rowNumber} of ${source}`, source);
    }
}

export class MalformedSourceError extends LoadError {
    readonly kind = 'malformed_source';

    constructor(source: string, readonly rowNumber: number | null, detail: string) {
        super(
            rowNumber !== null
                ? `Malformed CSV in ${source} at row ${rowNumber}: ${detail}`
                : `Malformed CSV in ${source}: ${detail}`,
            source
        );
    }
}

// ── Validation errors: fatal to one record ──

export type ValidationRule =
    | 'transaction_id'
    | 'transaction_date'
    | 'amount'
    | 'currency'
    | 'direction'
    | 'account_type';

export abstract class ValidationError extends Error {
    abstract readonly kind: ValidationRule;

    constructor(message: string, readonly field: string, readonly value: string | undefined) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidTransactionIdError extends ValidationError {
    readonly kind = 'transaction_id';

    constructor(value: string | undefined) {
        super(`Transaction ID must match pattern TXNxxxxxxx, got '${value ?? ''}'`, 'transaction_id', value);
    }
}

export class InvalidDateFormatError extends ValidationError {
    readonly kind = 'transaction_date';

    constructor(value: string | undefined) {
        super(`Date must be YYYY-MM-DD or DD/MM/YYYY, got '${value ?? ''}'`, 'transaction_date', value);
    }
}

export class InvalidAmountError extends ValidationError {
    readonly kind = 'amount';

    constructor(value: string | undefined, reason: string) {
        super(`Invalid amount '${value ?? ''}': ${reason}`, 'amount', value);
    }
}

export class InvalidCurrencyError extends ValidationError {
    readonly kind = 'currency';

    constructor(value: string | undefined, allowed: readonly string[]) {
        super(`Currency must be one of ${allowed.join(', ')}, got '${value ?? ''}'`, 'currency', value);
    }
}

export class InvalidDirectionError extends ValidationError {
    readonly kind = 'direction';

    constructor(value: string, allowed: readonly string[]) {
        super(`Direction must be one of ${allowed.join(', ')}, got '${value}'`, 'direction', value);
    }
}

export class InvalidAccountTypeError extends ValidationError {
    readonly kind = 'account_type';

    constructor(value: string, allowed: readonly string[]) {
        super(`Account type must be one of ${allowed.join(', ')}, got '${value}'`, 'account_type', value);
    }
}

// ── Transformation ──

/**
 * A mandatory field reached the transformer still malformed. Validation
 * should have rejected the record, so this is a pipeline contract violation.
 */
export class TransformError extends Error {
    readonly kind = 'transform';

    constructor(readonly field: string, readonly value: string | null | undefined) {
        super(`Cannot transform mandatory field '${field}' with value '${value ?? ''}'`);
        this.name = 'TransformError';
    }
}

// ── External calls ──

export class AttemptTimeoutError extends Error {
    readonly kind = 'timeout';

    constructor(readonly timeoutMs: number, label?: string) {
        super(`${label ?? 'Operation'} timed out after ${timeoutMs} ms`);
        this.name = 'AttemptTimeoutError';
    }
}

export class QuoteRequestError extends Error {
    readonly kind = 'quote_request';

    constructor(message: string, readonly status: number | null) {
        super(message);
        this.name = 'QuoteRequestError';
    }
}

export class InvalidSymbolError extends Error {
    readonly kind = 'invalid_symbol';

    constructor(readonly symbol: string) {
        super(`Invalid symbol: '${symbol}'`);
        this.name = 'InvalidSymbolError';
    }
}
