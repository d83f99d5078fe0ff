import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger, pruneOldLogs } from "./logging.js";
import { createCacheStore } from "./cache/store.js";
import { createFinnhubDirectory } from "./providers/finnhub.js";
import { RequestThrottle } from "./providers/throttle.js";
import { createYahooProvider } from "./providers/yahoo.js";
import { createHistoryFetcher } from "./screener/fetcher.js";
import { createPipeline } from "./screener/pipeline.js";
import { createSymbolValidator } from "./screener/validator.js";
import type { Batch } from "./screener/types.js";

function parseFromCache(): boolean {
  if (process.argv.includes("--from-cache")) return true;
  if (process.argv.includes("--refresh")) return false;
  return config.screener.readFromCache;
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

function printResults(batch: Batch): void {
  const exponential = batch
    .filter((r) => r.trend.isExponential)
    .sort((a, b) => b.trend.cagr - a.trend.cagr);

  console.log(`${batch.length} symbols analysed, ${exponential.length} with an exponential trend`);
  for (const record of exponential) {
    console.log(
      `  ${record.info.symbol.padEnd(8)} CAGR ${formatPercent(record.trend.cagr).padStart(9)}  ` +
        `R² ${record.trend.r2.toFixed(3)}  ${record.info.longName ?? ""}`,
    );
  }
}

async function main() {
  const readFromCache = parseFromCache();
  logger.info({ readFromCache, targetCount: config.screener.targetCount }, "Exponential screener starting");

  // Validate configuration early
  const validation = validateConfig({
    ...config,
    screener: { ...config.screener, readFromCache },
  });
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  pruneOldLogs();

  // One throttle for every Yahoo call — validation and history share the budget
  const throttle = new RequestThrottle(config.provider.requestDelayMs);
  const provider = createYahooProvider({ timeoutMs: config.provider.requestTimeoutMs });

  const pipeline = createPipeline({
    validator: createSymbolValidator({ provider, throttle }),
    fetcher: createHistoryFetcher({ provider, throttle }),
    cache: createCacheStore(config.cache.path),
    directory: createFinnhubDirectory({
      apiKey: config.finnhub.apiKey,
      baseUrl: config.finnhub.baseUrl,
      exchange: config.directory.exchange,
      securityTypes: config.directory.securityTypes,
    }),
    settings: {
      lookbackYears: config.screener.lookbackYears,
      r2Threshold: config.screener.r2Threshold,
      chartsDir: config.charts.dir,
    },
  });

  const batch = await pipeline.getSymbolRecords({
    readFromCache,
    targetCount: config.screener.targetCount,
  });
  printResults(batch);
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  // exit() would drop lines still queued in the transport worker
  process.exitCode = 1;
});
