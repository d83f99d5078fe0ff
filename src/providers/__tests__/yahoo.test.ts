import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { mockQuoteSummary, mockChart } = vi.hoisted(() => ({
  mockQuoteSummary: vi.fn(),
  mockChart: vi.fn(),
}));

// Mock yahoo-finance2 module
vi.mock("yahoo-finance2", () => ({
  default: class MockYahooFinance {
    quoteSummary = mockQuoteSummary;
    chart = mockChart;
  },
}));

import { RequestThrottle } from "../throttle.js";
import { createYahooProvider, toDateKey } from "../yahoo.js";

interface ModuleOpts {
  fetchOptions: { signal: AbortSignal };
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("This operation was aborted")));
  });
}

describe("Yahoo Finance Provider", () => {
  const provider = createYahooProvider({ timeoutMs: 50 });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("getLatestSession", () => {
    it("maps the price and profile modules into an issuer profile", async () => {
      mockQuoteSummary.mockResolvedValue({
        price: {
          regularMarketPrice: 187.5,
          longName: "Example Holdings Inc.",
          shortName: "Example Hldgs",
          marketCap: 52_000_000_000,
          currency: "USD",
          exchangeName: "NasdaqGS",
        },
        assetProfile: {
          address1: "1 Main Street",
          city: "Springfield",
          state: "IL",
          zip: "62701",
          country: "United States",
          website: "https://example.com",
          industry: "Software",
          sector: "Technology",
          longBusinessSummary: "Makes example software.",
        },
      });

      const session = await provider.getLatestSession("EXMP");

      expect(mockQuoteSummary).toHaveBeenCalledWith(
        "EXMP",
        { modules: ["price", "assetProfile", "summaryProfile"] },
        { fetchOptions: { signal: expect.any(AbortSignal) } },
      );
      expect(session).toEqual({
        symbol: "EXMP",
        lastPrice: 187.5,
        profile: {
          symbol: "EXMP",
          longName: "Example Holdings Inc.",
          shortName: "Example Hldgs",
          marketCap: 52_000_000_000,
          currency: "USD",
          exchange: "NasdaqGS",
          sector: "Technology",
          industry: "Software",
          website: "https://example.com",
          longBusinessSummary: "Makes example software.",
          address1: "1 Main Street",
          address2: null,
          city: "Springfield",
          state: "IL",
          zip: "62701",
          country: "United States",
        },
      });
    });

    it("fills profile gaps from summaryProfile", async () => {
      mockQuoteSummary.mockResolvedValue({
        price: { regularMarketPrice: 10 },
        assetProfile: { city: "Austin" },
        summaryProfile: { city: "Dallas", country: "United States", address2: "Suite 200" },
      });

      const { profile } = await provider.getLatestSession("ABC");

      expect(profile.city).toBe("Austin");
      expect(profile.country).toBe("United States");
      expect(profile.address2).toBe("Suite 200");
      expect(profile.longName).toBeNull();
      expect(profile.marketCap).toBeNull();
    });

    it("reports a null last price when the session has none", async () => {
      mockQuoteSummary.mockResolvedValue({ price: { longName: "Gone Corp" } });

      const session = await provider.getLatestSession("GONE");
      expect(session.lastPrice).toBeNull();
    });

    it("propagates upstream errors", async () => {
      mockQuoteSummary.mockRejectedValue(new Error("Quote not found for symbol: NOPE"));

      await expect(provider.getLatestSession("NOPE")).rejects.toThrow("Quote not found for symbol: NOPE");
    });

    it("aborts a hung request and reports the timeout", async () => {
      vi.useFakeTimers();
      let signal: AbortSignal | undefined;
      mockQuoteSummary.mockImplementation((_symbol: string, _opts: unknown, moduleOpts: ModuleOpts) => {
        signal = moduleOpts.fetchOptions.signal;
        return untilAborted(signal);
      });

      const pending = provider.getLatestSession("SLOW");
      const assertion = expect(pending).rejects.toThrow("Yahoo request timed out after 50ms");
      await vi.advanceTimersByTimeAsync(50);
      await assertion;

      expect(signal?.aborted).toBe(true);
    });

    it("keeps throttled calls from overlapping when one times out", async () => {
      vi.useFakeTimers();
      let inFlight = 0;
      let maxInFlight = 0;
      mockQuoteSummary.mockImplementation(
        (_symbol: string, _opts: unknown, moduleOpts: ModuleOpts) =>
          new Promise((resolve, reject) => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            const timer = setTimeout(() => {
              inFlight--;
              resolve({ price: { regularMarketPrice: 1 } });
            }, 300);
            moduleOpts.fetchOptions.signal.addEventListener("abort", () => {
              clearTimeout(timer);
              inFlight--;
              reject(new Error("This operation was aborted"));
            });
          }),
      );
      const throttle = new RequestThrottle(20);

      const settled = Promise.allSettled([
        throttle.run(() => provider.getLatestSession("SLOW1")),
        throttle.run(() => provider.getLatestSession("SLOW2")),
      ]);
      await vi.advanceTimersByTimeAsync(1000);
      const results = await settled;

      expect(results.map((r) => r.status)).toEqual(["rejected", "rejected"]);
      expect(maxInFlight).toBe(1);
      expect(inFlight).toBe(0);
    });
  });

  describe("getDailyHistory", () => {
    it("prefers the adjusted close and falls back to the raw close", async () => {
      mockChart.mockResolvedValue({
        quotes: [
          { date: new Date("2024-03-01T14:30:00Z"), close: 101, adjclose: 99.5 },
          { date: new Date("2024-03-04T14:30:00Z"), close: 102 },
          { date: new Date("2024-03-05T14:30:00Z"), close: null, adjclose: null },
        ],
      });

      const from = new Date("2019-03-05T12:00:00Z");
      const to = new Date("2024-03-05T12:00:00Z");
      const series = await provider.getDailyHistory("ABC", from, to);

      expect(mockChart).toHaveBeenCalledWith(
        "ABC",
        { period1: from, period2: to, interval: "1d" },
        { fetchOptions: { signal: expect.any(AbortSignal) } },
      );
      expect(series).toEqual([
        { date: "2024-03-01", price: 99.5 },
        { date: "2024-03-04", price: 102 },
        { date: "2024-03-05", price: null },
      ]);
    });

    it("returns an empty series when Yahoo has no quotes", async () => {
      mockChart.mockResolvedValue({ quotes: [] });

      await expect(provider.getDailyHistory("ABC", new Date(), new Date())).resolves.toEqual([]);
    });

    it("rejects an unexpected chart payload", async () => {
      mockChart.mockResolvedValue({ quotes: "nope" });

      await expect(provider.getDailyHistory("ABC", new Date(), new Date())).rejects.toThrow(
        "Unexpected chart response for ABC",
      );
    });
  });

  describe("toDateKey", () => {
    it("formats dates, ISO strings and epoch seconds as UTC days", () => {
      expect(toDateKey(new Date("2024-07-04T13:30:00Z"))).toBe("2024-07-04");
      expect(toDateKey("2024-07-05T13:30:00.000Z")).toBe("2024-07-05");
      expect(toDateKey(1720186200)).toBe("2024-07-05");
    });
  });
});
