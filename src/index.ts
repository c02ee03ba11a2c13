// src/index.ts

import { loadConfig } from './config/Config.ts';
import { TransactionLoader } from './loader/TransactionLoader.ts';
import { TransactionValidator } from './validator/TransactionValidator.ts';
import { TransactionPipeline } from './pipeline/TransactionPipeline.ts';
import { QuoteSource } from './source/QuoteSource.ts';
import { QuoteFetcher } from './source/QuoteFetcher.ts';
import type { AppConfig } from './config/Config.ts';
import type { PipelineResult, QuoteResult } from './model/Models.ts';
import { createLogger } from './utils/Logger.ts';

//central logger init
const logger = createLogger('app');
logger.info('Application starting...');


async function main() {
  const config = loadConfig();

  logger.info("banking ETL starting...");

  const loader = new TransactionLoader({ delimiter: config.csvDelimiter });
  const pipeline = new TransactionPipeline({
    validator: new TransactionValidator({
      rejectInvalidOptionalFields: config.rejectInvalidOptionalFields,
    }),
  });

  try {
    //step one: load and shape-check the whole file
    const records = await loader.load(config.transactionsCsv);
    //step two: validate, clean and transform a preview subset
    const result = pipeline.processBatch(records, config.previewLimit);

    prettyPrintResults(result);
  } catch (err) {
    logger.error({ err }, "ETL run failed");
    throw err;
  }

  //optional enrichment example, independent of the pipeline
  await demonstrateQuoteFetching(config);
}

async function demonstrateQuoteFetching(config: AppConfig) {
  const fetcher = new QuoteFetcher(
    new QuoteSource({ apiUrl: config.quote.apiUrl }),
    {
      maxAttempts: config.quote.maxAttempts,
      timeoutMs: config.quote.timeoutMs,
      backoffMs: config.quote.backoffMs,
    }
  );

  logger.info(`Fetching quotes for: ${config.quote.symbols.join(', ')}`);
  const quotes = await fetcher.fetchQuotes(config.quote.symbols);
  if (quotes.length === 0) {
    logger.warn("Could not fetch any quotes (network may be unavailable)");
  }
  prettyPrintQuotes(quotes);
}

/**
 * Preview table of the transformed records and the batch summary.
 */
function prettyPrintResults(result: PipelineResult) {
  console.log('\n' + '═'.repeat(96));
  console.log(`  Processed: ${result.processed} | Successful: ${result.records.length} | Failed: ${result.failures.length} | Anomalies: ${result.anomalies}`);
  console.log('═'.repeat(96));

  if (result.records.length > 0) {
    const header = `  ${'Transaction'.padEnd(12)} ${'Date'.padEnd(11)} ${'Day'.padEnd(10)} ${'Amount'.padStart(16)} ${'Cur'.padEnd(4)} ${'Large'.padEnd(6)} ${'X-border'.padEnd(9)} ${'Risk'.padStart(5)} ${'ln(Amt)'.padStart(8)}`;
    console.log(header);
    console.log('  ' + '─'.repeat(92));

    for (const t of result.records) {
      const date = t.transactionDate.toISOString().slice(0, 10);
      const risk = t.riskScore !== null ? t.riskScore.toFixed(2).padStart(5) : '  N/A';
      const log = t.amountLog !== null ? t.amountLog.toFixed(2).padStart(8) : '     N/A';
      console.log(`  ${t.transactionId.padEnd(12)} ${date.padEnd(11)} ${t.transactionDay.padEnd(10)} ${t.amount.toFixed(2).padStart(16)} ${t.currency.padEnd(4)} ${String(t.isLargeTransaction).padEnd(6)} ${String(t.isCrossBorder).padEnd(9)} ${risk} ${log}`);
    }
  }

  for (const f of result.failures) {
    console.log(`  ✗ #${f.index + 1} ${f.transactionId ?? '(no id)'}: ${f.error.name}: ${f.error.message}`);
  }

  console.log('═'.repeat(96) + '\n');
}

function prettyPrintQuotes(quotes: QuoteResult[]) {
  for (const q of quotes) {
    console.log(`  ${q.symbol.padEnd(6)} "${q.quote}" - ${q.author}`);
  }
  console.log('');
}

await main();
