/**
 * Finnhub symbol directory — lists every ticker listed on an exchange and
 * keeps the configured security types (common stock and ADRs by default).
 */
import { z } from "zod";
import { logProvider } from "../logging.js";
import type { CandidateSymbol } from "../screener/types.js";

const DEFAULT_TIMEOUT_MS = 30_000;

export class DirectoryError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "DirectoryError";
  }
}

const FinnhubSymbolSchema = z.object({
  symbol: z.string(),
  displaySymbol: z.string(),
  description: z.string().nullish(),
  type: z.string().nullish(),
  currency: z.string().nullish(),
  mic: z.string().nullish(),
  figi: z.string().nullish(),
});

export interface SymbolDirectoryOptions {
  apiKey: string;
  baseUrl: string;
  exchange: string;
  securityTypes: readonly string[];
  timeoutMs?: number;
}

export interface SymbolDirectory {
  listSymbols(): Promise<CandidateSymbol[]>;
}

export function createFinnhubDirectory(opts: SymbolDirectoryOptions): SymbolDirectory {
  async function listSymbols(): Promise<CandidateSymbol[]> {
    if (!opts.apiKey) {
      throw new DirectoryError("Finnhub API key is not configured");
    }

    const url = new URL(`${opts.baseUrl.replace(/\/+$/, "")}/stock/symbol`);
    url.searchParams.set("exchange", opts.exchange);

    const res = await fetch(url, {
      headers: { "X-Finnhub-Token": opts.apiKey },
      signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    if (!res.ok) {
      throw new DirectoryError(`Finnhub symbol lookup failed with HTTP ${res.status}`, res.status);
    }

    const parsed = z.array(FinnhubSymbolSchema).safeParse(await res.json());
    if (!parsed.success) {
      throw new DirectoryError("Finnhub symbol lookup returned an unexpected body");
    }

    const wanted = new Set(opts.securityTypes);
    const candidates = parsed.data
      .filter((s) => s.type != null && wanted.has(s.type))
      .map((s) => ({
        symbol: s.symbol,
        displaySymbol: s.displaySymbol,
        description: s.description ?? "",
        type: s.type ?? "",
        currency: s.currency ?? null,
        mic: s.mic ?? null,
        figi: s.figi ?? null,
      }));

    logProvider.info(
      { exchange: opts.exchange, listed: parsed.data.length, candidates: candidates.length },
      "Loaded symbol directory",
    );
    return candidates;
  }

  return { listSymbols };
}
