import { z } from "zod";

const nullableString = z.string().nullable();

// ── Symbol directory ─────────────────────────────────────────────────────

export interface CandidateSymbol {
  symbol: string;
  displaySymbol: string;
  description: string;
  type: string;
  currency: string | null;
  mic: string | null;
  figi: string | null;
}

// ── Issuer profile ───────────────────────────────────────────────────────

export const SymbolInfoSchema = z.object({
  symbol: z.string().trim().min(1),
  longName: nullableString,
  shortName: nullableString,
  marketCap: z.number().finite().nullable(),
  currency: nullableString,
  exchange: nullableString,
  sector: nullableString,
  industry: nullableString,
  website: nullableString,
  longBusinessSummary: nullableString,
  address1: nullableString,
  address2: nullableString,
  city: nullableString,
  state: nullableString,
  zip: nullableString,
  country: nullableString,
});

export type SymbolInfo = Readonly<z.infer<typeof SymbolInfoSchema>>;

// ── Price series ─────────────────────────────────────────────────────────

export const PricePointSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  /** null marks a missing observation */
  price: z.number().nullable(),
});

export type PricePoint = z.infer<typeof PricePointSchema>;
export type PriceSeries = PricePoint[];

// ── Trend classification ────────────────────────────────────────────────

export const TREND_ERROR_KINDS = ["InsufficientData", "InvalidPriceData", "DegenerateSeries"] as const;
export type TrendErrorKind = (typeof TREND_ERROR_KINDS)[number];

export const TrendResultSchema = z.object({
  status: z.enum(["classified", "unclassified"]),
  isExponential: z.boolean(),
  /** R² of the log-linear fit; 0 unless the series is exponential */
  r2: z.number().min(0).max(1),
  /** Compounded annual growth rate; 0 unless the series is exponential */
  cagr: z.number().finite(),
  predictedSeries: z.array(PricePointSchema).nullable(),
  reason: z.enum(TREND_ERROR_KINDS).nullable(),
});

export type TrendResult = z.infer<typeof TrendResultSchema>;

export const UNCLASSIFIED_TREND: TrendResult = {
  status: "unclassified",
  isExponential: false,
  r2: 0,
  cagr: 0,
  predictedSeries: null,
  reason: null,
};

// ── Batch ────────────────────────────────────────────────────────────────

export const SymbolRecordSchema = z.object({
  info: SymbolInfoSchema,
  series: z.array(PricePointSchema),
  trend: TrendResultSchema,
  chartPath: nullableString,
});

export type SymbolRecord = z.infer<typeof SymbolRecordSchema>;
export type Batch = SymbolRecord[];

// ── Per-step outcomes ───────────────────────────────────────────────────

export type ValidationOutcome =
  | { kind: "valid"; info: SymbolInfo }
  | { kind: "invalid"; reason: string };

export type FetchOutcome =
  | { kind: "series"; series: PriceSeries }
  | { kind: "no_data"; reason: string };

export interface ScanSummary {
  examined: number;
  invalid: number;
  noData: number;
  included: number;
  exponential: number;
}
