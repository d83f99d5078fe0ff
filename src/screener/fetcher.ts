import { logProvider } from "../logging.js";
import type { RequestThrottle } from "../providers/throttle.js";
import type { MarketDataProvider } from "../providers/yahoo.js";
import type { FetchOutcome, PriceSeries } from "./types.js";

export const DEFAULT_LOOKBACK_YEARS = 5;

export interface HistoryFetcherDeps {
  provider: MarketDataProvider;
  throttle: RequestThrottle;
  /** Defaults to the wall clock */
  today?: () => Date;
}

export interface HistoryFetcher {
  fetch(ticker: string, lookbackYears?: number): Promise<FetchOutcome>;
}

/**
 * Date range ending `to` and starting the same calendar day `years` earlier.
 * A day the earlier month lacks (Feb 29) clamps to that month's last day.
 */
export function lookbackWindow(to: Date, years: number): { from: Date; to: Date } {
  const from = new Date(to);
  const day = from.getDate();
  from.setDate(1);
  from.setFullYear(from.getFullYear() - years);
  const lastDay = new Date(from.getFullYear(), from.getMonth() + 1, 0).getDate();
  from.setDate(Math.min(day, lastDay));
  return { from, to };
}

/** Sort by date and drop duplicate dates, keeping the last observation. */
export function normalizeSeries(points: PriceSeries): PriceSeries {
  const byDate = new Map<string, number | null>();
  for (const point of points) {
    byDate.set(point.date, point.price);
  }
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, price]) => ({ date, price }));
}

export function createHistoryFetcher(deps: HistoryFetcherDeps): HistoryFetcher {
  const today = deps.today ?? (() => new Date());

  async function fetch(ticker: string, lookbackYears: number = DEFAULT_LOOKBACK_YEARS): Promise<FetchOutcome> {
    const { from, to } = lookbackWindow(today(), lookbackYears);

    let raw: PriceSeries;
    try {
      raw = await deps.throttle.run(() => deps.provider.getDailyHistory(ticker, from, to));
    } catch (e: unknown) {
      const reason = `history request failed: ${e instanceof Error ? e.message : String(e)}`;
      logProvider.warn({ symbol: ticker, err: e }, `${ticker}: ${reason}`);
      return { kind: "no_data", reason };
    }

    const series = normalizeSeries(raw);
    if (series.length === 0) {
      const reason = "no historical data in range";
      logProvider.warn({ symbol: ticker, from: from.toISOString(), to: to.toISOString() }, `${ticker}: ${reason}`);
      return { kind: "no_data", reason };
    }

    logProvider.debug({ symbol: ticker, points: series.length }, "Fetched daily history");
    return { kind: "series", series };
  }

  return { fetch };
}
