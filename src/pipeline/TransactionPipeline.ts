import { createLogger } from '../utils/Logger.ts';
import { TransactionValidator } from '../validator/TransactionValidator.ts';
import { TransactionCleaner } from '../cleaner/TransactionCleaner.ts';
import { TransactionTransformer } from '../transformer/TransactionTransformer.ts';
import { TransformError, ValidationError } from '../model/Errors.ts';
import { TransactionField } from '../model/Models.ts';

import type {
    PipelineResult,
    RawRecord,
    RecordFailure,
    TransformedTransaction,
} from '../model/Models.ts';
import type { Logger } from 'pino';

export interface PipelineStages {
    validator?: TransactionValidator;
    cleaner?: TransactionCleaner;
    transformer?: TransactionTransformer;
    logger?: Logger;
}

/**
 * Runs validate → clean → transform over loaded records.
 *
 * The stages keep no per-record state, so the records of a batch are
 * independent of each other and of processing order.
 */
export class TransactionPipeline {
    private validator: TransactionValidator;
    private cleaner: TransactionCleaner;
    private transformer: TransactionTransformer;
    private logger: Logger;

    constructor(stages: PipelineStages = {}) {
        this.logger = stages.logger ?? createLogger('TransactionPipeline');
        this.validator = stages.validator ?? new TransactionValidator();
        this.cleaner = stages.cleaner ?? new TransactionCleaner();
        this.transformer = stages.transformer ?? new TransactionTransformer();
    }

    processRecord(raw: RawRecord): TransformedTransaction {
        const validated = this.validator.validate(raw);
        const cleaned = this.cleaner.clean(validated);
        return this.transformer.transform(cleaned);
    }

    /**
     * Processes up to `limit` records. Validation and transform failures are
     * collected per record; any other error aborts the batch.
     */
    processBatch(records: readonly RawRecord[], limit: number = records.length): PipelineResult {
        const batch = records.slice(0, Math.max(0, limit));
        this.logger.info(`Processing ${batch.length} of ${records.length} transactions`);

        const transformed: TransformedTransaction[] = [];
        const failures: RecordFailure[] = [];
        let anomalies = 0;

        batch.forEach((raw, index) => {
            try {
                transformed.push(this.processRecord(raw));
                if (this.validator.isAmountAnomaly(raw)) {
                    anomalies++;
                }
            } catch (err) {
                if (!(err instanceof ValidationError || err instanceof TransformError)) {
                    throw err;
                }
                const transactionId = raw[TransactionField.TransactionId] ?? null;
                this.logger.warn(
                    { index, transactionId, kind: err.kind },
                    `Transaction ${index + 1} rejected: ${err.name}: ${err.message}`
                );
                failures.push({ index, transactionId, error: err });
            }
        });

        const processed = batch.length;
        const successRate = processed > 0 ? (transformed.length / processed) * 100 : 0;
        this.logger.info(
            `Processed ${processed}: ${transformed.length} successful, ${failures.length} failed ` +
            `(${successRate.toFixed(1)}% success), ${anomalies} anomalies`
        );

        return { records: transformed, failures, processed, anomalies };
    }
}
