import type { Clock } from "../../providers/throttle.js";
import type { CandidateSymbol, PriceSeries, SymbolInfo } from "../types.js";

export function makeInfo(symbol: string, overrides: Partial<SymbolInfo> = {}): SymbolInfo {
  return {
    symbol,
    longName: `${symbol} Corporation`,
    shortName: symbol,
    marketCap: 1_000_000_000,
    currency: "USD",
    exchange: "NYSE",
    sector: null,
    industry: null,
    website: null,
    longBusinessSummary: null,
    address1: null,
    address2: null,
    city: null,
    state: null,
    zip: null,
    country: null,
    ...overrides,
  };
}

export function makeCandidate(ticker: string): CandidateSymbol {
  return {
    symbol: ticker,
    displaySymbol: ticker,
    description: `${ticker} CORP`,
    type: "Common Stock",
    currency: "USD",
    mic: "XNYS",
    figi: null,
  };
}

/** Daily series starting 2024-01-01, one entry per price. */
export function dailySeries(prices: Array<number | null>): PriceSeries {
  const start = Date.UTC(2024, 0, 1);
  return prices.map((price, i) => ({
    date: new Date(start + i * 86_400_000).toISOString().slice(0, 10),
    price,
  }));
}

export function growingSeries(n: number, p0 = 50, k = 0.02): PriceSeries {
  return dailySeries(Array.from({ length: n }, (_, t) => p0 * Math.exp(k * t)));
}

export class FakeClock implements Clock {
  time = 0;
  sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}
