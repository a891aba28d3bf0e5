/**
 * Tests for the composite market overview: join, exclusion rule, sector rollup.
 */
import { describe, it, expect, vi } from "vitest";
import {
  buildMarketOverview,
  mergeMarketOverview,
  OVERVIEW_SOURCE_PATHS,
  type OverviewSources,
} from "../../services/aggregator/src/index.js";
import { Logger } from "../../services/shared/src/logger.js";
import type { JsonFetcher } from "../../services/upstream/src/cache.js";

const STAMP = "2026-02-10 15:00:00";

function fixture(): OverviewSources {
  return {
    companies: [
      { symbol: "FIN1", sectorName: "Finance", securityName: "Finance One Limited", instrumentType: "Equity" },
      { symbol: "FIN2", sectorName: "Finance", securityName: "Finance Two Limited", instrumentType: "Equity" },
      { symbol: "HALT", sectorName: "Finance", securityName: "Halted Finance Limited", instrumentType: "Equity" },
      { symbol: "NOPC", sectorName: "Hydro Power", securityName: "No Close Hydro Limited", instrumentType: "Equity" },
      { symbol: "MYST", sectorName: "Mystery Sector", securityName: "Mystery Limited" },
    ],
    topTurnover: [
      { symbol: "FIN1", turnover: 100 },
      { symbol: "FIN2", turnover: 50 },
      { symbol: "HALT", turnover: 999 },
    ],
    topTransaction: [{ symbol: "FIN1", totalTrades: 7 }],
    topTrade: [{ symbol: "FIN2", shareTraded: 300 }],
    gainers: [
      { symbol: "FIN1", pointChange: 2, percentageChange: 1.5, ltp: 135 },
      { symbol: "NOPC", pointChange: 1, percentageChange: 10, ltp: 10 },
    ],
    losers: [
      { symbol: "FIN1", pointChange: -9, percentageChange: -9, ltp: 1 },
      { symbol: "FIN2", pointChange: -1, percentageChange: -2, ltp: 49 },
    ],
    priceVolume: [
      { symbol: "FIN1", previousClose: 133, lastUpdatedDateTime: STAMP },
      { symbol: "FIN2", previousClose: 50, lastUpdatedDateTime: STAMP },
      { symbol: "HALT", previousClose: 5, lastUpdatedDateTime: STAMP },
    ],
    subIndices: [
      { index: "Finance Index", currentValue: 2100 },
      { index: "Banking SubIndex", currentValue: 1400 },
    ],
  };
}

function quietLogger() {
  const log = new Logger("aggregator-test");
  const integrity = vi.spyOn(log, "integrity").mockImplementation(() => undefined);
  return { log, integrity };
}

describe("mergeMarketOverview", () => {
  it("should join sources per scrip, gainers before losers", () => {
    const { log } = quietLogger();
    const { scripsDetails } = mergeMarketOverview(fixture(), log);

    expect(scripsDetails["FIN1"]).toEqual({
      symbol: "FIN1",
      sector: "Finance",
      Turnover: 100,
      transaction: 7,
      volume: 0,
      previousClose: 133,
      lastUpdatedDateTime: STAMP,
      name: "Finance One Limited",
      category: "Equity",
      pointChange: 2,
      percentageChange: 1.5,
      ltp: 135,
    });
    expect(scripsDetails["FIN2"]).toMatchObject({ Turnover: 50, transaction: 0, volume: 300, ltp: 49 });
  });

  it("should drop scrips with a zero last traded price or previous close", () => {
    const { log } = quietLogger();
    const { scripsDetails } = mergeMarketOverview(fixture(), log);

    expect(Object.keys(scripsDetails)).toEqual(["FIN1", "FIN2"]);
  });

  it("should roll up surviving scrips per sector", () => {
    const { log } = quietLogger();
    const { sectorsDetails } = mergeMarketOverview(fixture(), log);

    expect(sectorsDetails["Finance"]).toEqual({
      transaction: 7,
      volume: 300,
      totalTurnover: 150,
      turnover: { index: "Finance Index", currentValue: 2100 },
      sectorName: "Finance",
    });
    expect(Object.keys(sectorsDetails)).toEqual(["Finance", "Hydro Power", "Mystery Sector"]);
  });

  it("should null the sub-index and log when a sector cannot be placed", () => {
    const { log, integrity } = quietLogger();
    const { sectorsDetails } = mergeMarketOverview(fixture(), log);

    expect(sectorsDetails["Hydro Power"]).toEqual({
      transaction: 0,
      volume: 0,
      totalTurnover: 0,
      turnover: null,
      sectorName: "Hydro Power",
    });
    expect(sectorsDetails["Mystery Sector"]?.turnover).toBeNull();
    expect(integrity).toHaveBeenCalledWith("sector has no sub-index mapping", { sector: "Mystery Sector" });
    expect(integrity).toHaveBeenCalledWith("mapped sub-index missing from payload", {
      sector: "Hydro Power",
      label: "HydroPower Index",
    });
  });

  it("should default missing figures to zero", () => {
    const { log } = quietLogger();
    const sources = fixture();
    sources.topTurnover = [{ symbol: "FIN1", turnover: "lots" }];

    const { scripsDetails } = mergeMarketOverview(sources, log);

    expect(scripsDetails["FIN1"]?.Turnover).toBe(0);
  });

  it("should treat a non-array collection as empty", () => {
    const { log, integrity } = quietLogger();
    const sources = fixture();
    sources.gainers = { error: "upstream hiccup" };

    const { scripsDetails } = mergeMarketOverview(sources, log);

    expect(scripsDetails["FIN1"]?.ltp).toBe(1);
    expect(integrity).toHaveBeenCalledWith("collection is not an array", { source: "gainers", received: "object" });
  });

  it("should skip rows without a symbol", () => {
    const { log, integrity } = quietLogger();
    const sources = fixture();
    sources.topTransaction = [{ totalTrades: 3 }, { symbol: "FIN1", totalTrades: 7 }];

    const { scripsDetails } = mergeMarketOverview(sources, log);

    expect(scripsDetails["FIN1"]?.transaction).toBe(7);
    expect(integrity).toHaveBeenCalledWith("rows skipped", { source: "topTransaction", skipped: 1, kept: 1 });
  });

  it("should treat symbols and sectors named like prototype keys as data", () => {
    const { log, integrity } = quietLogger();
    const sources: OverviewSources = {
      companies: [{ symbol: "__proto__", sectorName: "constructor", securityName: "Odd Keys Limited" }],
      topTurnover: [{ symbol: "__proto__", turnover: 40 }],
      topTransaction: [],
      topTrade: [],
      gainers: [{ symbol: "__proto__", pointChange: 1, percentageChange: 10, ltp: 11 }],
      losers: [],
      priceVolume: [{ symbol: "__proto__", previousClose: 10, lastUpdatedDateTime: STAMP }],
      subIndices: [],
    };

    const { scripsDetails, sectorsDetails } = mergeMarketOverview(sources, log);

    expect(Object.keys(scripsDetails)).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(scripsDetails)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(scripsDetails, "__proto__")?.value).toMatchObject({
      symbol: "__proto__",
      sector: "constructor",
      Turnover: 40,
    });
    expect(Object.keys(sectorsDetails)).toEqual(["constructor"]);
    expect(Object.getOwnPropertyDescriptor(sectorsDetails, "constructor")?.value).toEqual({
      transaction: 0,
      volume: 0,
      totalTurnover: 40,
      turnover: null,
      sectorName: "constructor",
    });
    expect(integrity).toHaveBeenCalledWith("sector has no sub-index mapping", { sector: "constructor" });
  });
});

describe("buildMarketOverview", () => {
  it("should fetch every source through the fetcher", async () => {
    const sources = fixture();
    const byPath = new Map<string, unknown>([
      [OVERVIEW_SOURCE_PATHS.companies, sources.companies],
      [OVERVIEW_SOURCE_PATHS.topTurnover, sources.topTurnover],
      [OVERVIEW_SOURCE_PATHS.topTransaction, sources.topTransaction],
      [OVERVIEW_SOURCE_PATHS.topTrade, sources.topTrade],
      [OVERVIEW_SOURCE_PATHS.gainers, sources.gainers],
      [OVERVIEW_SOURCE_PATHS.losers, sources.losers],
      [OVERVIEW_SOURCE_PATHS.priceVolume, sources.priceVolume],
      [OVERVIEW_SOURCE_PATHS.subIndices, sources.subIndices],
    ]);
    const fetch = vi.fn(async (path: string) => byPath.get(path));
    const fetcher: JsonFetcher = { fetch };
    const { log } = quietLogger();

    const overview = await buildMarketOverview(fetcher, log);

    expect(fetch).toHaveBeenCalledTimes(8);
    expect(overview.sectorsDetails["Finance"]?.totalTurnover).toBe(150);
  });
});
