import { z } from 'zod';

import { createLogger } from '../utils/Logger.ts';
import { InvalidSymbolError, QuoteRequestError } from '../model/Errors.ts';

import type { QuoteResult } from '../model/Models.ts';
import type { Logger } from 'pino';

export const DEFAULT_QUOTE_API_URL = 'https://dummyjson.com/quotes/random';

const quoteResponseSchema = z.object({
    quote: z.string().default(''),
    author: z.string().default('Unknown'),
});

export interface QuoteSourceOptions {
    apiUrl?: string;
    fetchFn?: typeof fetch;
    logger?: Logger;
}

/**
 * Single-attempt client for the quote service. Retrying and fan-out
 * live in QuoteFetcher.
 */
export class QuoteSource {
    readonly apiUrl: string;
    private fetchFn: typeof fetch;
    private logger: Logger;

    constructor(options: QuoteSourceOptions = {}) {
        this.apiUrl = options.apiUrl ?? DEFAULT_QUOTE_API_URL;
        this.fetchFn = options.fetchFn ?? fetch;
        this.logger = options.logger ?? createLogger('QuoteSource');
    }

    /**
     * Fetches one quote and tags it with `symbol`.
     * @param signal aborts the request, e.g. on attempt timeout
     */
    async fetchQuote(symbol: string, signal?: AbortSignal): Promise<QuoteResult> {
        if (symbol.trim() === '') {
            throw new InvalidSymbolError(symbol);
        }

        this.logger.info(`Fetching quote for symbol: ${symbol}`);

        const response = await this.fetchFn(this.apiUrl, {
            method: 'GET',
            headers: {
                'Accept': 'application/json'
            },
            redirect: 'follow',
            signal
        });

        if (!response.ok) {
            const err = new QuoteRequestError(`API returned status ${response.status}`, response.status);
            this.logger.error(err.message);
            throw err;
        }

        const body = await response.text();
        const parsed = quoteResponseSchema.safeParse(this.parseJson(body));
        if (!parsed.success) {
            const err = new QuoteRequestError(
                `Unexpected quote payload: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
                response.status
            );
            this.logger.error(err.message);
            throw err;
        }

        this.logger.debug(`Successfully fetched quote for ${symbol}`);
        return {
            symbol,
            quote: parsed.data.quote,
            author: parsed.data.author,
        };
    }

    private parseJson(body: string): unknown {
        try {
            return JSON.parse(body);
        } catch (err) {
            this.logger.error({ err }, 'Quote response is not valid JSON');
            throw new QuoteRequestError('Quote response is not valid JSON', null);
        }
    }
}
