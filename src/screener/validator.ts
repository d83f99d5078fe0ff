import { logProvider } from "../logging.js";
import type { RequestThrottle } from "../providers/throttle.js";
import type { LatestSession, MarketDataProvider } from "../providers/yahoo.js";
import { SymbolInfoSchema, type ValidationOutcome } from "./types.js";

export interface SymbolValidatorDeps {
  provider: MarketDataProvider;
  throttle: RequestThrottle;
}

export interface SymbolValidator {
  validate(ticker: string): Promise<ValidationOutcome>;
}

/**
 * Confirms a ticker traded in the latest session and captures its issuer
 * profile. Any provider failure is an `invalid` outcome, never a throw.
 */
export function createSymbolValidator(deps: SymbolValidatorDeps): SymbolValidator {
  async function validate(ticker: string): Promise<ValidationOutcome> {
    let session: LatestSession;
    try {
      session = await deps.throttle.run(() => deps.provider.getLatestSession(ticker));
    } catch (e: unknown) {
      const reason = `validation failed: ${e instanceof Error ? e.message : String(e)}`;
      logProvider.warn({ symbol: ticker, err: e }, `${ticker}: ${reason}`);
      return { kind: "invalid", reason };
    }

    if (session.lastPrice === null) {
      const reason = "no price in the latest session (invalid or delisted)";
      logProvider.warn({ symbol: ticker }, `${ticker}: ${reason}`);
      return { kind: "invalid", reason };
    }

    const parsed = SymbolInfoSchema.safeParse(session.profile);
    if (!parsed.success) {
      const reason = `malformed issuer profile: ${parsed.error.issues[0]?.message ?? "invalid"}`;
      logProvider.warn({ symbol: ticker }, `${ticker}: ${reason}`);
      return { kind: "invalid", reason };
    }

    logProvider.debug({ symbol: ticker, lastPrice: session.lastPrice }, "Symbol validated");
    return { kind: "valid", info: Object.freeze(parsed.data) };
  }

  return { validate };
}
