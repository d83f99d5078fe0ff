import path from "path";
import { classifySeries } from "../analysis/trend.js";
import type { CacheErrorKind, CacheStore } from "../cache/store.js";
import { logScan } from "../logging.js";
import type { SymbolDirectory } from "../providers/finnhub.js";
import type { HistoryFetcher } from "./fetcher.js";
import type { Batch, CandidateSymbol, ScanSummary, SymbolRecord } from "./types.js";
import type { SymbolValidator } from "./validator.js";

export class CacheLoadError extends Error {
  constructor(
    readonly kind: CacheErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "CacheLoadError";
  }
}

export interface PipelineSettings {
  lookbackYears: number;
  r2Threshold: number;
  chartsDir: string;
}

export interface PipelineDeps {
  readonly validator: SymbolValidator;
  readonly fetcher: HistoryFetcher;
  readonly cache: CacheStore;
  /** Only needed when acquiring fresh data through getSymbolRecords */
  readonly directory?: SymbolDirectory;
  readonly settings: PipelineSettings;
}

export interface ScanResult {
  batch: Batch;
  summary: ScanSummary;
}

export type CandidateSource = Iterable<CandidateSymbol> | AsyncIterable<CandidateSymbol>;

export function chartPathFor(chartsDir: string, ticker: string): string {
  return path.join(chartsDir, `${ticker}_chart.png`);
}

export function createPipeline(deps: PipelineDeps) {
  const { settings } = deps;

  /**
   * Walk the candidates in order until `targetCount` records have data or the
   * source runs dry. A candidate that fails validation or has no history is
   * logged and skipped; every fetched series ends up in the batch, classified
   * or not. The finished batch replaces the cache before it is returned.
   */
  async function scan(targetCount: number, candidates: CandidateSource): Promise<ScanResult> {
    const batch: Batch = [];
    const summary: ScanSummary = { examined: 0, invalid: 0, noData: 0, included: 0, exponential: 0 };

    if (targetCount > 0) {
      for await (const candidate of candidates) {
        summary.examined++;
        const ticker = candidate.displaySymbol;

        const validation = await deps.validator.validate(ticker);
        if (validation.kind === "invalid") {
          summary.invalid++;
          logScan.warn({ symbol: ticker, reason: validation.reason }, `Skipping ${ticker}: invalid or delisted`);
          continue;
        }

        const history = await deps.fetcher.fetch(ticker, settings.lookbackYears);
        if (history.kind === "no_data") {
          summary.noData++;
          logScan.warn({ symbol: ticker, reason: history.reason }, `Skipping ${ticker}: no historical data`);
          continue;
        }

        const trend = classifySeries(ticker, history.series, {
          r2Threshold: settings.r2Threshold,
          lookbackYears: settings.lookbackYears,
        });
        const record: SymbolRecord = {
          info: validation.info,
          series: history.series,
          trend,
          chartPath: trend.isExponential ? chartPathFor(settings.chartsDir, ticker) : null,
        };
        batch.push(record);
        summary.included++;
        if (trend.isExponential) summary.exponential++;

        logScan.info(
          { symbol: ticker, progress: `${batch.length}/${targetCount}`, exponential: trend.isExponential },
          `Included ${ticker}`,
        );
        if (batch.length >= targetCount) break;
      }
    }

    deps.cache.save(batch);
    logScan.info(summary, "Scan complete");
    return { batch, summary };
  }

  async function run(targetCount: number, candidates: CandidateSource): Promise<Batch> {
    const { batch } = await scan(targetCount, candidates);
    return batch;
  }

  /**
   * Either read the last batch back from the cache or acquire a new one from
   * the symbol directory. A cache that is missing or unreadable is an error;
   * there is no silent fallback to acquisition.
   */
  async function getSymbolRecords(opts: { readFromCache: boolean; targetCount: number }): Promise<Batch> {
    if (opts.readFromCache) {
      const loaded = deps.cache.load();
      if (!loaded.ok) {
        throw new CacheLoadError(loaded.error.kind, loaded.error.message);
      }
      return loaded.batch;
    }

    if (!deps.directory) {
      throw new Error("A symbol directory is required to acquire fresh data");
    }
    const candidates = await deps.directory.listSymbols();
    return run(opts.targetCount, candidates);
  }

  return { scan, run, getSymbolRecords };
}

export type Pipeline = ReturnType<typeof createPipeline>;
