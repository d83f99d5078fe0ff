import YahooFinance from "yahoo-finance2";
import { z } from "zod";
import type { PriceSeries, SymbolInfo } from "../screener/types.js";

const yf = new YahooFinance({ suppressNotices: ["yahooSurvey"] });

const DEFAULT_TIMEOUT_MS = 8000;

/**
 * Run a request with an abort signal that fires after `ms`. The returned
 * promise settles only once the request itself has settled, so a timed-out
 * call is never left running behind the caller's back.
 */
async function withTimeout<T>(request: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), ms);
  try {
    return await request(controller.signal);
  } catch (err) {
    if (controller.signal.aborted) throw new Error(`Yahoo request timed out after ${ms}ms`);
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

// ─── Interfaces ───────────────────────────────────────────────

export interface LatestSession {
  symbol: string;
  /** Last regular-session price; null when Yahoo reports none */
  lastPrice: number | null;
  profile: SymbolInfo;
}

/**
 * The two upstream queries the screener needs. Implementations throw on any
 * transport or upstream failure; callers decide what a failure means.
 */
export interface MarketDataProvider {
  getLatestSession(symbol: string): Promise<LatestSession>;
  getDailyHistory(symbol: string, from: Date, to: Date): Promise<PriceSeries>;
}

// ─── Response shapes ─────────────────────────────────────────

const optionalText = z.string().nullish();
const optionalNumber = z.unknown().transform(finiteOrNull);

const PriceModuleSchema = z.object({
  regularMarketPrice: optionalNumber,
  longName: optionalText,
  shortName: optionalText,
  marketCap: optionalNumber,
  currency: optionalText,
  exchangeName: optionalText,
});

const ProfileModuleSchema = z.object({
  address1: optionalText,
  address2: optionalText,
  city: optionalText,
  state: optionalText,
  zip: optionalText,
  country: optionalText,
  website: optionalText,
  industry: optionalText,
  sector: optionalText,
  longBusinessSummary: optionalText,
});

type ProfileModule = z.infer<typeof ProfileModuleSchema>;

const ChartQuoteSchema = z.object({
  date: z.union([z.date(), z.string(), z.number()]),
  close: optionalNumber,
  adjclose: optionalNumber,
});

const ChartSchema = z.object({
  quotes: z.array(ChartQuoteSchema).nullish(),
});

// ─── Functions ────────────────────────────────────────────────

export function createYahooProvider(opts: { timeoutMs?: number } = {}): MarketDataProvider {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  async function getLatestSession(symbol: string): Promise<LatestSession> {
    const qs = await withTimeout(
      (signal) =>
        yf.quoteSummary(
          symbol,
          { modules: ["price", "assetProfile", "summaryProfile"] },
          { fetchOptions: { signal } },
        ),
      timeoutMs,
    );

    const price = PriceModuleSchema.safeParse(qs.price ?? {});
    if (!price.success) {
      throw new Error(`Unexpected price module for ${symbol}: ${price.error.issues[0]?.message ?? "invalid"}`);
    }
    const profile = mergeProfiles(qs.assetProfile, qs.summaryProfile);

    return {
      symbol,
      lastPrice: price.data.regularMarketPrice,
      profile: {
        symbol,
        longName: price.data.longName ?? null,
        shortName: price.data.shortName ?? null,
        marketCap: price.data.marketCap,
        currency: price.data.currency ?? null,
        exchange: price.data.exchangeName ?? null,
        sector: profile.sector ?? null,
        industry: profile.industry ?? null,
        website: profile.website ?? null,
        longBusinessSummary: profile.longBusinessSummary ?? null,
        address1: profile.address1 ?? null,
        address2: profile.address2 ?? null,
        city: profile.city ?? null,
        state: profile.state ?? null,
        zip: profile.zip ?? null,
        country: profile.country ?? null,
      },
    };
  }

  async function getDailyHistory(symbol: string, from: Date, to: Date): Promise<PriceSeries> {
    const chart = await withTimeout(
      (signal) => yf.chart(symbol, { period1: from, period2: to, interval: "1d" }, { fetchOptions: { signal } }),
      timeoutMs,
    );

    const parsed = ChartSchema.safeParse(chart);
    if (!parsed.success) {
      throw new Error(`Unexpected chart response for ${symbol}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }

    return (parsed.data.quotes ?? []).map((bar) => ({
      date: toDateKey(bar.date),
      // Split/dividend-adjusted close when Yahoo supplies one
      price: bar.adjclose ?? bar.close,
    }));
  }

  return { getLatestSession, getDailyHistory };
}

// ─── Helpers ──────────────────────────────────────────────────

function finiteOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function mergeProfiles(...modules: unknown[]): ProfileModule {
  const merged: ProfileModule = {};
  for (const mod of modules) {
    const parsed = ProfileModuleSchema.safeParse(mod ?? {});
    if (!parsed.success) continue;
    for (const [key, value] of Object.entries(parsed.data)) {
      if (value == null) continue;
      if (isProfileKey(key) && merged[key] == null) merged[key] = value;
    }
  }
  return merged;
}

function isProfileKey(key: string): key is keyof ProfileModule {
  return key in ProfileModuleSchema.shape;
}

/** YYYY-MM-DD in UTC. */
export function toDateKey(value: Date | string | number): string {
  const date = value instanceof Date ? value : new Date(typeof value === "number" && value < 1e12 ? value * 1000 : value);
  return date.toISOString().slice(0, 10);
}
