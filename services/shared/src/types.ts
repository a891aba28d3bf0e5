/**
 * Shared Type Definitions
 * Wire shapes and domain records used by more than one service.
 */

// ─── Rate Limiting ────────────────────────────────────────────────────

export const ENDPOINT_CATEGORIES = [
  "health",
  "validation",
  "market_data",
  "websocket_connection",
  "websocket_message",
  "default",
] as const;

export type EndpointCategory = (typeof ENDPOINT_CATEGORIES)[number];

export type RateLimits = Record<EndpointCategory, number>;

export interface Admission {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch ms at which the oldest counted request leaves the window */
  resetAt: number;
  category: EndpointCategory;
}

// ─── Market State ─────────────────────────────────────────────────────

export type MarketState = "open" | "closed";

// ─── Stock Snapshot ───────────────────────────────────────────────────

export interface StockRecord {
  name: string;
  sector: string;
  internalSector: string;
}

/** symbol (upper-case) → record, in file order */
export type StockMap = Record<string, StockRecord>;

// ─── Validation ───────────────────────────────────────────────────────

export type SymbolValidation =
  | { valid: true; symbol: string; info: StockRecord }
  | {
      valid: false;
      reason: "required" | "not_found";
      message: string;
      symbol: string | null;
      suggestions: string[];
    };

export type IndexValidation =
  | { valid: true; indexName: string }
  | {
      valid: false;
      reason: "required" | "not_found";
      message: string;
      indexName: string | null;
      suggestions: string[];
    };

export type CompanyMatchType = "exact" | "partial";

export interface CompanyMatch {
  symbol: string;
  companyName: string;
  sector: string;
  matchType: CompanyMatchType;
}

export interface CompanySearchResult {
  found: boolean;
  query: string;
  matches: CompanyMatch[];
  totalMatches: number;
}

export type SymbolLookupResult =
  | { found: true; symbol: string; companyName: string; fullInfo: StockRecord }
  | { found: false; symbol: string; message: string };

export interface ValidatorStats {
  totalStocks: number;
  totalIndices: number;
  sampleStocks: string[];
  availableIndices: string[];
}

// ─── Market Overview ──────────────────────────────────────────────────

export interface ScripDetail {
  symbol: string;
  sector: string;
  Turnover: number;
  transaction: number;
  volume: number;
  previousClose: number;
  lastUpdatedDateTime: string | number;
  name: string;
  category: string | null;
  pointChange: number;
  percentageChange: number;
  ltp: number;
}

export interface SubIndexRow {
  index: string;
  [field: string]: unknown;
}

export interface SectorDetail {
  transaction: number;
  volume: number;
  totalTurnover: number;
  /** Live sub-index row for the sector, null when the sector cannot be mapped */
  turnover: SubIndexRow | null;
  sectorName: string;
}

export interface MarketOverview {
  scripsDetails: Record<string, ScripDetail>;
  sectorsDetails: Record<string, SectorDetail>;
}
