import { createLogger } from '../utils/Logger.ts';
import { callWithRetry } from '../utils/Retry.ts';
import { InvalidSymbolError } from '../model/Errors.ts';

import type { QuoteSource } from './QuoteSource.ts';
import type { QuoteOutcome, QuoteResult } from '../model/Models.ts';
import type { RetryOptions } from '../utils/Retry.ts';
import type { Logger } from 'pino';

export type QuoteRetryOptions = Pick<RetryOptions, 'maxAttempts' | 'timeoutMs' | 'backoffMs' | 'sleep'>;

/**
 * Fetches quotes for many symbols at once, each through its own
 * retry loop. One symbol failing never cancels the others.
 */
export class QuoteFetcher {
    private logger: Logger;

    constructor(
        private source: QuoteSource,
        private retryOptions: QuoteRetryOptions = {},
        logger?: Logger
    ) {
        this.logger = logger ?? createLogger('QuoteFetcher');
    }

    /**
     * Retry-wrapped single fetch. Rejects with the last error once
     * attempts are exhausted.
     */
    fetchQuote(symbol: string): Promise<QuoteResult> {
        return callWithRetry((signal) => this.source.fetchQuote(symbol, signal), {
            ...this.retryOptions,
            // a blank symbol stays blank on every attempt
            shouldRetry: (err) => !(err instanceof InvalidSymbolError),
            label: `fetchQuote(${symbol})`,
            logger: this.logger,
        });
    }

    /**
     * One outcome per requested symbol, in request order.
     */
    async fetchQuoteOutcomes(symbols: string[]): Promise<QuoteOutcome[]> {
        this.logger.info(`Fetching ${symbols.length} quotes concurrently`);

        const settled = await Promise.allSettled(symbols.map((symbol) => this.fetchQuote(symbol)));

        return settled.map((result, i): QuoteOutcome =>
            result.status === 'fulfilled'
                ? { symbol: symbols[i], status: 'fulfilled', value: result.value }
                : { symbol: symbols[i], status: 'rejected', error: toError(result.reason) }
        );
    }

    /**
     * Successful quotes only; failed symbols are logged and dropped.
     * Callers get no ordering guarantee.
     */
    async fetchQuotes(symbols: string[]): Promise<QuoteResult[]> {
        const outcomes = await this.fetchQuoteOutcomes(symbols);
        const quotes: QuoteResult[] = [];

        for (const outcome of outcomes) {
            if (outcome.status === 'fulfilled') {
                quotes.push(outcome.value);
            } else {
                this.logger.warn({ err: outcome.error }, `Error fetching quote for ${outcome.symbol}`);
            }
        }

        this.logger.info(`Successfully fetched ${quotes.length} quotes`);
        return quotes;
    }
}

function toError(reason: unknown): Error {
    return reason instanceof Error ? reason : new Error(String(reason));
}
