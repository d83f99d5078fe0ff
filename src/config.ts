import dotenv from "dotenv";

dotenv.config();

type Env = Record<string, string | undefined>;

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (raw === undefined) return fallback;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Build the screener configuration from environment variables.
 *
 * Constructed once at startup and handed to the pipeline; nothing downstream
 * reads `process.env` directly.
 */
export function loadConfig(env: Env = process.env) {
  return {
    finnhub: {
      apiKey: env.FINNHUB_API_KEY ?? "",
      baseUrl: env.FINNHUB_BASE_URL ?? "https://finnhub.io/api/v1",
    },
    directory: {
      exchange: env.SCREENER_EXCHANGE ?? "US",
      securityTypes: parseList(env.SCREENER_SECURITY_TYPES, ["Common Stock", "ADR"]),
    },
    screener: {
      targetCount: parseInt(env.SCREENER_TARGET_COUNT ?? "100", 10),
      lookbackYears: parseInt(env.SCREENER_LOOKBACK_YEARS ?? "5", 10),
      r2Threshold: parseFloat(env.SCREENER_R2_THRESHOLD ?? "0.8"),
      readFromCache: (env.SCREENER_READ_FROM_CACHE ?? "false") === "true",
    },
    provider: {
      /** Minimum gap between the end of one provider call and the start of the next */
      requestDelayMs: parseInt(env.SCREENER_REQUEST_DELAY_MS ?? "2000", 10),
      requestTimeoutMs: parseInt(env.SCREENER_REQUEST_TIMEOUT_MS ?? "8000", 10),
    },
    cache: {
      path: env.SCREENER_CACHE_PATH ?? "data/cache.db",
    },
    charts: {
      dir: env.SCREENER_CHARTS_DIR ?? "charts",
    },
  };
}

export type ScreenerConfig = ReturnType<typeof loadConfig>;

export const config: ScreenerConfig = loadConfig();
