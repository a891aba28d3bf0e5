/**
 * Tests for symbol/index validation and company-name search.
 */
import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  StockValidator,
  companyKey,
  fileSnapshotSource,
  stripCorporateSuffix,
} from "../../services/validator/src/index.js";
import type { StockMap } from "../../services/shared/src/types.js";

const STOCKS: StockMap = {
  NABIL: { name: "Nabil Bank Limited", sector: "Commercial Banks", internalSector: "Banking SubIndex" },
  NABBC: { name: "Narayani Development Bank Limited", sector: "Development Banks", internalSector: "Development Bank Ind." },
  BON: { name: "Bank of Nepal Limited", sector: "Commercial Banks", internalSector: "Banking SubIndex" },
  NHDL: { name: "Nepal Hydro Developers Limited", sector: "Hydro Power", internalSector: "HydroPower Index" },
  NLIC: { name: "Nepal Life Insurance Company Limited", sector: "Life Insurance", internalSector: "Life Insurance" },
  UPPER: { name: "Upper Tamakoshi Hydropower Limited", sector: "Hydro Power", internalSector: "HydroPower Index" },
};

describe("company name normalization", () => {
  it("should strip the longest corporate suffix", () => {
    expect(stripCorporateSuffix("Nepal Life Insurance Company Limited")).toBe("nepal life");
    expect(stripCorporateSuffix("Narayani Development Bank Limited")).toBe("narayani");
    expect(stripCorporateSuffix("Laxmi Laghubitta Bittiya Sanstha Limited")).toBe("laxmi");
    expect(stripCorporateSuffix("Nepal Hydro Developers Ltd.")).toBe("nepal hydro developers");
  });

  it("should take the first significant word", () => {
    expect(companyKey("The Himalayan Bank Ltd.")).toBe("himalayan");
    expect(companyKey("Nepal Hydro Developers Limited")).toBe("nepal");
    expect(companyKey("an")).toBe("");
  });
});

describe("StockValidator symbols", () => {
  const validator = new StockValidator(STOCKS);

  it("should be case-insensitive", () => {
    expect(validator.validateStockSymbol("nabil")).toEqual(validator.validateStockSymbol("NABIL"));
    expect(validator.validateStockSymbol(" nabil ")).toEqual({
      valid: true,
      symbol: "NABIL",
      info: STOCKS["NABIL"],
    });
  });

  it("should require a symbol", () => {
    expect(validator.validateStockSymbol("   ")).toEqual({
      valid: false,
      reason: "required",
      message: "Stock symbol is required",
      symbol: null,
      suggestions: [],
    });
  });

  it("should suggest symbols sharing the first two characters", () => {
    const result = validator.validateStockSymbol("naxyz");

    expect(result).toEqual({
      valid: false,
      reason: "not_found",
      message: "Stock symbol 'NAXYZ' not found. Please check if it's a valid NEPSE listed company.",
      symbol: "NAXYZ",
      suggestions: ["NABIL", "NABBC"],
    });
  });

  it("should cap suggestions at five", () => {
    const many: StockMap = {};
    for (let i = 1; i <= 8; i++) {
      many[`ZZ${i}`] = { name: `Sample ${i} Limited`, sector: "Others", internalSector: "Others Index" };
    }
    const result = new StockValidator(many).validateStockSymbol("ZZZINVALID");

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.suggestions).toEqual(["ZZ1", "ZZ2", "ZZ3", "ZZ4", "ZZ5"]);
    expect(result.suggestions.every((s) => s.startsWith("ZZ"))).toBe(true);
  });

  it("should return no suggestions when nothing shares the prefix", () => {
    const result = validator.validateStockSymbol("ZZZINVALID");
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.suggestions).toEqual([]);
  });
});

describe("StockValidator indices", () => {
  const validator = new StockValidator(STOCKS);

  it("should accept corrected and legacy names", () => {
    expect(validator.validateIndexName("Banking SubIndex")).toEqual({ valid: true, indexName: "Banking SubIndex" });
    expect(validator.validateIndexName("Manufacturing And Pr.")).toEqual({
      valid: true,
      indexName: "Manufacturing And Pr.",
    });
    expect(validator.validateIndexName("  NEPSE Index ")).toEqual({ valid: true, indexName: "NEPSE Index" });
  });

  it("should be case-sensitive and list the known indices", () => {
    const result = validator.validateIndexName("banking subindex");

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.reason).toBe("not_found");
    expect(result.message).toBe("Index 'banking subindex' not found.");
    expect(result.suggestions).toHaveLength(18);
    expect(result.suggestions).toContain("Banking SubIndex");
  });

  it("should require an index name", () => {
    expect(validator.validateIndexName("")).toMatchObject({ valid: false, reason: "required", indexName: null });
  });
});

describe("StockValidator company search", () => {
  const validator = new StockValidator(STOCKS);

  it("should find both Nepal companies as exact matches before partial ones", () => {
    const result = validator.findSymbolByCompanyName("Nepal");

    expect(result.found).toBe(true);
    expect(result.query).toBe("Nepal");
    expect(result.totalMatches).toBe(3);
    expect(result.matches.map((m) => [m.symbol, m.matchType])).toEqual([
      ["NHDL", "exact"],
      ["NLIC", "exact"],
      ["BON", "partial"],
    ]);
  });

  it("should match by key prefix", () => {
    const result = validator.findSymbolByCompanyName("nab");

    expect(result.matches).toEqual([
      { symbol: "NABIL", companyName: "Nabil Bank Limited", sector: "Commercial Banks", matchType: "partial" },
    ]);
  });

  it("should match a word inside the name", () => {
    const result = validator.findSymbolByCompanyName("hydro");
    expect(result.matches.map((m) => m.symbol)).toEqual(["NHDL", "UPPER"]);
  });

  it("should cap matches at ten", () => {
    const many: StockMap = {};
    for (let i = 1; i <= 12; i++) {
      many[`S${i}`] = { name: `Sample ${i} Limited`, sector: "Others", internalSector: "Others Index" };
    }
    const result = new StockValidator(many).findSymbolByCompanyName("sample");

    expect(result.matches).toHaveLength(10);
    expect(result.totalMatches).toBe(12);
  });

  it("should find nothing for a query with no significant word", () => {
    expect(validator.findSymbolByCompanyName("the")).toEqual({
      found: false,
      query: "the",
      matches: [],
      totalMatches: 0,
    });
  });

  it("should look up a company by symbol", () => {
    expect(validator.findCompanyNameBySymbol("nhdl")).toEqual({
      found: true,
      symbol: "NHDL",
      companyName: "Nepal Hydro Developers Limited",
      fullInfo: STOCKS["NHDL"],
    });
    expect(validator.findCompanyNameBySymbol("xyz")).toEqual({
      found: false,
      symbol: "XYZ",
      message: "Symbol 'XYZ' not found",
    });
  });

  it("should report stats", () => {
    expect(validator.stats()).toMatchObject({
      totalStocks: 6,
      totalIndices: 18,
      sampleStocks: ["NABIL", "NABBC", "BON", "NHDL", "NLIC", "UPPER"],
    });
  });
});

describe("fileSnapshotSource", () => {
  let dir = "";

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = "";
  });

  it("should load a snapshot file lazily", () => {
    dir = mkdtempSync(join(tmpdir(), "stockmap-"));
    const path = join(dir, "stockmap.json");
    writeFileSync(path, JSON.stringify({ NABIL: STOCKS["NABIL"] }));

    const validator = new StockValidator(fileSnapshotSource(path));

    expect(validator.validateStockSymbol("nabil").valid).toBe(true);
  });

  it("should yield an empty set for a missing file", () => {
    const validator = new StockValidator(fileSnapshotSource(join(tmpdir(), "does-not-exist", "stockmap.json")));
    expect(validator.stats().totalStocks).toBe(0);
  });

  it("should yield an empty set for malformed content", () => {
    dir = mkdtempSync(join(tmpdir(), "stockmap-"));
    const bad = join(dir, "bad.json");
    const wrongShape = join(dir, "wrong.json");
    writeFileSync(bad, "{ not json");
    writeFileSync(wrongShape, JSON.stringify({ NABIL: { name: 1 } }));

    expect(fileSnapshotSource(bad)()).toEqual({});
    expect(fileSnapshotSource(wrongShape)()).toEqual({});
  });
});
