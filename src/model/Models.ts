/**
 * Column names of the banking transactions CSV.
 */
export const TransactionField = {
    TransactionId: 'transaction_id',
    TransactionDate: 'transaction_date',
    ValueDate: 'value_date',
    CustomerId: 'customer_id',
    AccountId: 'account_id',
    AccountType: 'account_type',
    TxnType: 'txn_type',
    Channel: 'channel',
    Direction: 'direction',
    Amount: 'amount',
    Currency: 'currency',
    MerchantCategory: 'merchant_category',
    Region: 'region',
    RiskScore: 'risk_score',
    IsFraudSuspected: 'is_fraud_suspected',
} as const;

export type TransactionFieldName = (typeof TransactionField)[keyof typeof TransactionField];

/**
 * Fields every source file must carry in its header
 */
export const MANDATORY_FIELDS: readonly TransactionFieldName[] = [
    TransactionField.TransactionId,
    TransactionField.TransactionDate,
    TransactionField.CustomerId,
    TransactionField.AccountId,
    TransactionField.Amount,
    TransactionField.Currency,
];

/**
 * A row as read from the source file: header name → raw cell text.
 * Key order follows the header.
 */
export type RawRecord = Readonly<Record<string, string>>;

/**
 * Validation only asserts, it never rewrites, so a validated record
 * is the raw record itself.
 */
export type ValidatedRecord = RawRecord;

/**
 * A normalized record. `null` marks a value that is missing or could not be
 * normalized (empty amount, unparseable date, ...).
 */
export type CleanedRecord = Readonly<Record<string, string | null>>;

export type Weekday =
    | 'Monday'
    | 'Tuesday'
    | 'Wednesday'
    | 'Thursday'
    | 'Friday'
    | 'Saturday'
    | 'Sunday';

/**
 * A fully typed transaction with derived features, ready for analytics
 */
export interface TransformedTransaction {
    transactionId: string;
    transactionDate: Date;         // UTC midnight
    valueDate: Date | null;
    customerId: string;
    accountId: string;
    accountType: string | null;
    direction: string | null;
    amount: number;
    currency: string;
    merchantCategory: string;
    riskScore: number | null;
    /** Remaining columns (channel, region, ...) as cleaned */
    attributes: Record<string, string | null>;

    // ── Derived features ──
    isLargeTransaction: boolean;
    isCrossBorder: boolean;
    transactionDay: Weekday;
    amountLog: number | null;
}

/**
 * A record that failed validation or transformation during a batch run
 */
export interface RecordFailure {
    index: number;                 // 0-based position in the batch
    transactionId: string | null;
    error: Error;
}

/**
 * Result of a pipeline batch run
 */
export interface PipelineResult {
    records: TransformedTransaction[];
    failures: RecordFailure[];
    processed: number;
    /** Records accepted with an amount above the anomaly threshold */
    anomalies: number;
}

// ── Quote service models ──

/**
 * One successfully fetched quote
 */
export interface QuoteResult {
    readonly symbol: string;
    readonly quote: string;
    readonly author: string;
}

/**
 * Per-symbol outcome of a concurrent fetch
 */
export type QuoteOutcome =
    | { symbol: string; status: 'fulfilled'; value: QuoteResult }
    | { symbol: string; status: 'rejected'; error: Error };
