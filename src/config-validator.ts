import type { ScreenerConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

const MIN_SAFE_DELAY_MS = 500;

/**
 * Validates configuration values.
 *
 * Checks:
 * - Finnhub API key is set (only a warning when reading from cache)
 * - At least one security type is configured for the symbol directory
 * - targetCount and lookbackYears are positive integers
 * - r2Threshold is in range (0-1)
 * - requestDelayMs is a non-negative integer (warning below 500ms)
 * - requestTimeoutMs is a positive integer
 * - cache path is set
 *
 * @param cfg - Configuration object from config.ts
 * @returns ValidationResult with arrays of error and warning messages
 */
export function validateConfig(cfg: ScreenerConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!cfg.finnhub.apiKey) {
    if (cfg.screener.readFromCache) {
      warnings.push("FINNHUB_API_KEY is not set — only cached results can be read");
    } else {
      errors.push("FINNHUB_API_KEY is required to list candidate symbols");
    }
  }

  if (cfg.directory.securityTypes.length === 0) {
    errors.push("At least one security type is required (SCREENER_SECURITY_TYPES)");
  }

  if (!isPositiveInteger(cfg.screener.targetCount)) {
    errors.push(`screener.targetCount must be a positive integer, got ${cfg.screener.targetCount}`);
  }

  if (!isPositiveInteger(cfg.screener.lookbackYears)) {
    errors.push(`screener.lookbackYears must be a positive integer, got ${cfg.screener.lookbackYears}`);
  }

  if (!isValidThreshold(cfg.screener.r2Threshold)) {
    errors.push(`screener.r2Threshold must be between 0 and 1, got ${cfg.screener.r2Threshold}`);
  }

  if (!Number.isInteger(cfg.provider.requestDelayMs) || cfg.provider.requestDelayMs < 0) {
    errors.push(`provider.requestDelayMs must be a non-negative integer, got ${cfg.provider.requestDelayMs}`);
  } else if (cfg.provider.requestDelayMs < MIN_SAFE_DELAY_MS) {
    warnings.push(
      `provider.requestDelayMs is ${cfg.provider.requestDelayMs}ms (recommended: at least ${MIN_SAFE_DELAY_MS}ms to avoid throttling)`,
    );
  }

  if (!isPositiveInteger(cfg.provider.requestTimeoutMs)) {
    errors.push(`provider.requestTimeoutMs must be a positive integer, got ${cfg.provider.requestTimeoutMs}`);
  }

  if (!cfg.cache.path) {
    errors.push("cache.path is required");
  }

  return { errors, warnings };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Checks if a threshold value is in the valid range (0-1).
 */
function isValidThreshold(threshold: number): boolean {
  return !isNaN(threshold) && threshold >= 0 && threshold <= 1;
}
