import { logAnalysis } from "../logging.js";
import {
  UNCLASSIFIED_TREND,
  type PricePoint,
  type PriceSeries,
  type TrendErrorKind,
  type TrendResult,
} from "../screener/types.js";
import { fitLine } from "./regression.js";

export const DEFAULT_R2_THRESHOLD = 0.8;

export interface TrendError {
  kind: TrendErrorKind;
  message: string;
}

export interface TrendFit {
  isExponential: boolean;
  r2: number;
  /** Growth per observation in log space */
  slope: number;
  intercept: number;
  /** Back-transformed fitted prices, only for exponential series */
  predictedSeries: PriceSeries | null;
  points: number;
}

export type TrendOutcome = { ok: true; fit: TrendFit } | { ok: false; error: TrendError };
export type CagrOutcome = { ok: true; cagr: number } | { ok: false; error: TrendError };

type Observation = PricePoint & { price: number };

function usableObservations(series: PriceSeries): Observation[] {
  const out: Observation[] = [];
  for (const point of series) {
    if (point.price !== null && Number.isFinite(point.price)) {
      out.push({ date: point.date, price: point.price });
    }
  }
  return out;
}

/**
 * Fit log(price) against an observation index and decide whether the series
 * shows sustained exponential growth: R² at or above the threshold and a
 * positive slope. A decaying or flat series never qualifies.
 */
export function analyzeTrend(series: PriceSeries, r2Threshold: number = DEFAULT_R2_THRESHOLD): TrendOutcome {
  const observations = usableObservations(series);
  if (observations.length < 2) {
    return {
      ok: false,
      error: {
        kind: "InsufficientData",
        message: `need at least 2 price points, got ${observations.length}`,
      },
    };
  }

  const bad = observations.find((o) => o.price <= 0);
  if (bad) {
    return {
      ok: false,
      error: {
        kind: "InvalidPriceData",
        message: `non-positive price ${bad.price} on ${bad.date}`,
      },
    };
  }

  const timeIndex = observations.map((_, i) => i);
  const logPrices = observations.map((o) => Math.log(o.price));
  const { slope, intercept, r2, predicted } = fitLine(timeIndex, logPrices);

  const isExponential = r2 >= r2Threshold && slope > 0;
  const predictedSeries = isExponential
    ? observations.map((o, i) => ({ date: o.date, price: Math.exp(predicted[i]) }))
    : null;

  return {
    ok: true,
    fit: { isExponential, r2, slope, intercept, predictedSeries, points: observations.length },
  };
}

/**
 * Compounded annual growth rate between the first and last usable prices,
 * over a fixed number of years (the lookback window, not the series span).
 */
export function computeCagr(series: PriceSeries, years: number): CagrOutcome {
  const observations = usableObservations(series);
  if (observations.length === 0) {
    return { ok: false, error: { kind: "DegenerateSeries", message: "no usable prices" } };
  }
  if (!(years > 0)) {
    return { ok: false, error: { kind: "DegenerateSeries", message: `years must be positive, got ${years}` } };
  }

  const initial = observations[0].price;
  const final = observations[observations.length - 1].price;
  if (initial === 0) {
    return { ok: false, error: { kind: "DegenerateSeries", message: "initial price is zero" } };
  }

  return { ok: true, cagr: (final / initial) ** (1 / years) - 1 };
}

/**
 * Classify a series into the trend fields stored on a record. R² and CAGR
 * are attached only when the series is exponential; every other outcome
 * keeps the zero sentinels.
 */
export function classifySeries(
  symbol: string,
  series: PriceSeries,
  opts: { r2Threshold: number; lookbackYears: number },
): TrendResult {
  const outcome = analyzeTrend(series, opts.r2Threshold);
  if (!outcome.ok) {
    logAnalysis.info({ symbol, kind: outcome.error.kind }, `${symbol}: unclassified (${outcome.error.message})`);
    return { ...UNCLASSIFIED_TREND, reason: outcome.error.kind };
  }

  const { fit } = outcome;
  if (!fit.isExponential) {
    logAnalysis.debug({ symbol, r2: fit.r2, slope: fit.slope }, "No exponential trend");
    return { ...UNCLASSIFIED_TREND, status: "classified" };
  }

  const cagr = computeCagr(series, opts.lookbackYears);
  if (!cagr.ok) {
    logAnalysis.warn({ symbol, kind: cagr.error.kind }, `${symbol}: CAGR unavailable (${cagr.error.message})`);
    return { ...UNCLASSIFIED_TREND, reason: cagr.error.kind };
  }

  logAnalysis.info({ symbol, r2: fit.r2, cagr: cagr.cagr }, `${symbol}: exponential trend`);
  return {
    status: "classified",
    isExponential: true,
    r2: fit.r2,
    cagr: cagr.cagr,
    predictedSeries: fit.predictedSeries,
    reason: null,
  };
}
