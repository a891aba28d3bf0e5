/**
 * Stock Validator
 *
 * Validates symbols and index names against the stock snapshot and answers
 * company-name lookups. The snapshot is read lazily on first use and is
 * immutable for the life of the validator.
 */
import type {
  CompanyMatch,
  CompanySearchResult,
  IndexValidation,
  StockMap,
  StockRecord,
  SymbolLookupResult,
  SymbolValidation,
  ValidatorStats,
} from "../../shared/src/types.js";
import { companyKey, stripCorporateSuffix } from "./company-search.js";
import { INDEX_NAMES } from "./indices.js";
import { type SnapshotSource, staticSnapshotSource } from "./snapshot-source.js";

const MAX_SUGGESTIONS = 5;
const MAX_COMPANY_MATCHES = 10;
const SAMPLE_SIZE = 10;

interface IndexedStock {
  symbol: string;
  record: StockRecord;
  key: string;
  stripped: string;
}

export class StockValidator {
  private source: SnapshotSource;
  private stocks: Map<string, StockRecord> | null = null;
  private searchIndex: IndexedStock[] = [];
  private indexNames: ReadonlySet<string>;

  constructor(source: SnapshotSource | StockMap, indexNames: readonly string[] = INDEX_NAMES) {
    this.source = typeof source === "function" ? source : staticSnapshotSource(source);
    this.indexNames = new Set(indexNames);
  }

  validateStockSymbol(input: string | null | undefined): SymbolValidation {
    const symbol = (input ?? "").trim().toUpperCase();
    if (!symbol) {
      return {
        valid: false,
        reason: "required",
        message: "Stock symbol is required",
        symbol: null,
        suggestions: [],
      };
    }

    const info = this.snapshot().get(symbol);
    if (info) {
      return { valid: true, symbol, info };
    }

    return {
      valid: false,
      reason: "not_found",
      message: `Stock symbol '${symbol}' not found. Please check if it's a valid NEPSE listed company.`,
      symbol,
      suggestions: this.similarSymbols(symbol),
    };
  }

  validateIndexName(input: string | null | undefined): IndexValidation {
    const indexName = (input ?? "").trim();
    if (!indexName) {
      return {
        valid: false,
        reason: "required",
        message: "Index name is required",
        indexName: null,
        suggestions: [],
      };
    }

    if (this.indexNames.has(indexName)) {
      return { valid: true, indexName };
    }

    return {
      valid: false,
      reason: "not_found",
      message: `Index '${indexName}' not found.`,
      indexName,
      suggestions: [...this.indexNames],
    };
  }

  findSymbolByCompanyName(query: string): CompanySearchResult {
    const trimmed = query.trim();
    const queryKey = companyKey(trimmed);
    if (!queryKey) {
      return { found: false, query: trimmed, matches: [], totalMatches: 0 };
    }

    this.snapshot();
    const exact: CompanyMatch[] = [];
    const partial: CompanyMatch[] = [];

    for (const entry of this.searchIndex) {
      if (entry.key === queryKey) {
        exact.push(toMatch(entry, "exact"));
      } else if (entry.key.startsWith(queryKey) || entry.stripped.includes(queryKey)) {
        partial.push(toMatch(entry, "partial"));
      }
    }

    const all = [...exact, ...partial];
    return {
      found: all.length > 0,
      query: trimmed,
      matches: all.slice(0, MAX_COMPANY_MATCHES),
      totalMatches: all.length,
    };
  }

  findCompanyNameBySymbol(input: string): SymbolLookupResult {
    const symbol = input.trim().toUpperCase();
    const info = this.snapshot().get(symbol);
    if (!info) {
      return { found: false, symbol, message: `Symbol '${symbol}' not found` };
    }
    return { found: true, symbol, companyName: info.name, fullInfo: info };
  }

  stats(): ValidatorStats {
    const symbols = [...this.snapshot().keys()];
    return {
      totalStocks: symbols.length,
      totalIndices: this.indexNames.size,
      sampleStocks: symbols.slice(0, SAMPLE_SIZE),
      availableIndices: [...this.indexNames],
    };
  }

  private snapshot(): Map<string, StockRecord> {
    if (this.stocks) return this.stocks;

    const stocks = new Map<string, StockRecord>();
    for (const [symbol, record] of Object.entries(this.source())) {
      stocks.set(symbol.toUpperCase(), record);
    }
    this.stocks = stocks;
    this.searchIndex = [...stocks].map(([symbol, record]) => ({
      symbol,
      record,
      key: companyKey(record.name),
      stripped: stripCorporateSuffix(record.name),
    }));
    return stocks;
  }

  private similarSymbols(symbol: string): string[] {
    const prefix = symbol.slice(0, 2);
    const similar: string[] = [];
    for (const candidate of this.snapshot().keys()) {
      if (candidate.startsWith(prefix)) similar.push(candidate);
      if (similar.length >= MAX_SUGGESTIONS) break;
    }
    return similar;
  }
}

function toMatch(entry: IndexedStock, matchType: CompanyMatch["matchType"]): CompanyMatch {
  return {
    symbol: entry.symbol,
    companyName: entry.record.name,
    sector: entry.record.sector,
    matchType,
  };
}
