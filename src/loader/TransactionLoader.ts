import { access, constants, readFile } from 'node:fs/promises';
import Papa from 'papaparse';

import { createLogger } from '../utils/Logger.ts';
import { MANDATORY_FIELDS } from '../model/Models.ts';
import {
    ColumnMismatchError,
    EmptyRowError,
    MalformedSourceError,
    MissingMandatoryFieldError,
    SourceNotFoundError,
} from '../model/Errors.ts';

import type { RawRecord } from '../model/Models.ts';
import type { Logger } from 'pino';

export interface LoaderOptions {
    delimiter?: string;
    logger?: Logger;
}

/**
 * Reads a delimited transactions file into RawRecords.
 *
 * The whole file is shape-checked before anything is returned: a missing
 * mandatory column, a row with the wrong column count or a row of empty
 * cells fails the load as a whole.
 */
export class TransactionLoader {
    private logger: Logger;
    private delimiter: string;

    constructor(options: LoaderOptions = {}) {
        this.logger = options.logger ?? createLogger('TransactionLoader');
        this.delimiter = options.delimiter ?? ',';
    }

    async load(path: string): Promise<RawRecord[]> {
        this.logger.info(`Loading CSV from: ${path}`);

        let text: string;
        try {
            // a directory passes the access check and only fails on read
            await access(path, constants.R_OK);
            text = await readFile(path, 'utf-8');
        } catch (err) {
            this.logger.error({ err }, `CSV file not found or not readable: ${path}`);
            throw new SourceNotFoundError(path, { cause: err });
        }

        return this.parse(text, path);
    }

    /**
     * Parses CSV text already in memory.
     * @param source Name used in log lines and error messages
     */
    parse(text: string, source: string): RawRecord[] {
        const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
            delimiter: this.delimiter,
            skipEmptyLines: false,
        });

        const quoteError = result.errors.find((e) => e.type === 'Quotes');
        if (quoteError) {
            const rowNumber = quoteError.row !== undefined ? quoteError.row + 1 : null;
            const err = new MalformedSourceError(source, rowNumber, quoteError.message);
            this.logger.error(err.message);
            throw err;
        }

        // Row numbers are file lines: a quoted cell may span several
        const linebreak = result.meta.linebreak || '\n';
        let line = 1;
        const numbered = result.data.map((cells) => {
            const rowNumber = line;
            line += 1 + cells.reduce((n, cell) => n + cell.split(linebreak).length - 1, 0);
            return { cells, rowNumber };
        });

        // Zero-length lines (the trailing newline included) are not rows
        const rows = numbered.filter(({ cells }) => !(cells.length === 1 && cells[0] === ''));

        const headerRow = rows.shift();
        const header = headerRow?.cells ?? [];
        this.checkMandatoryFields(header, source);
        this.logger.info(`CSV headers verified. Found columns: ${header.join(', ')}`);

        const records: RawRecord[] = [];
        for (const { cells, rowNumber } of rows) {
            if (cells.every((cell) => cell === '')) {
                const err = new EmptyRowError(source, rowNumber);
                this.logger.warn(err.message);
                throw err;
            }

            if (cells.length !== header.length) {
                const err = new ColumnMismatchError(source, rowNumber, header.length, cells.length);
                this.logger.error(err.message);
                throw err;
            }

            records.push(Object.freeze(
                Object.fromEntries(header.map((name, i) => [name, cells[i]]))
            ));
        }

        this.logger.info(`Successfully loaded ${records.length} rows from ${source}`);
        return records;
    }

    private checkMandatoryFields(header: string[], source: string): void {
        const present = new Set(header);
        const missing = MANDATORY_FIELDS.filter((field) => !present.has(field));

        if (missing.length > 0) {
            const err = new MissingMandatoryFieldError(source, missing);
            this.logger.error(err.message);
            throw err;
        }
    }
}
