/**
 * Route Dispatch Table
 *
 * One closed table maps every logical route name to how it is served:
 * a plain upstream passthrough, a passthrough keyed on validated parameters,
 * or a composite computed in-process. Every transport resolves routes here,
 * so adding a route is a single compile-checked entry.
 */
import { z } from "zod";
import { buildMarketOverview, indexRowsByLabel } from "../../aggregator/src/overview.js";
import { createLogger } from "../../shared/src/logger.js";
import type { MarketState, SubIndexRow } from "../../shared/src/types.js";
import type { RateLimiter } from "../../rate-limiter/src/limiter.js";
import type { JsonFetcher } from "../../upstream/src/cache.js";
import type { StockValidator } from "../../validator/src/validator.js";

const log = createLogger("routes");

// ─── Descriptor Types ─────────────────────────────────────────────────

/**
 * - symbol: validated against the snapshot and canonicalized to upper case
 * - index: validated against the known index names
 * - text: any non-empty string (or "" when optional)
 */
export type ParamKind = "symbol" | "index" | "text";

export interface ParamSpec {
  name: string;
  kind: ParamKind;
  optional?: boolean;
}

export type ResolvedParams = Readonly<Record<string, string>>;

export type PayloadTransform = (payload: unknown) => unknown;

export interface RouteContext {
  fetcher: JsonFetcher;
  validator: StockValidator;
  limiter: RateLimiter;
}

interface RouteBase {
  description: string;
  marketState?: MarketState;
}

export interface PassthroughRoute extends RouteBase {
  kind: "passthrough";
  path: string;
  transform?: PayloadTransform;
}

/** Upstream path with the resolved params appended as a query string. */
export interface ParameterizedRoute extends RouteBase {
  kind: "parameterized";
  path: string;
  params: readonly ParamSpec[];
  transform?: PayloadTransform;
}

export interface CompositeRoute extends RouteBase {
  kind: "composite";
  params?: readonly ParamSpec[];
  run: (ctx: RouteContext, params: ResolvedParams) => unknown;
}

export type RouteDescriptor = PassthroughRoute | ParameterizedRoute | CompositeRoute;

// ─── Transforms ───────────────────────────────────────────────────────

const summaryRow = z.object({ detail: z.string(), value: z.unknown() });

/** `[{ detail, value }]` → `{ [detail]: value }` */
export function summaryToRecord(payload: unknown): Record<string, unknown> {
  if (!Array.isArray(payload)) {
    log.integrity("summary payload is not an array", { received: typeof payload });
    return {};
  }
  const entries = new Map<string, unknown>();
  for (const item of payload) {
    const row = summaryRow.safeParse(item);
    if (row.success) entries.set(row.data.detail, row.data.value);
  }
  return Object.fromEntries(entries);
}

/** Index rows keyed by their `index` label. */
export function keyByIndex(payload: unknown): Record<string, SubIndexRow> {
  return Object.fromEntries(indexRowsByLabel(payload, "index rows", log));
}

// ─── Table ────────────────────────────────────────────────────────────

const SYMBOL: readonly ParamSpec[] = [{ name: "symbol", kind: "symbol" }];

const passthrough = (path: string, description: string, marketState?: MarketState): PassthroughRoute => ({
  kind: "passthrough",
  path,
  description,
  ...(marketState && { marketState }),
});

const dailyGraph = (name: string, subject: string): PassthroughRoute =>
  passthrough(`/${name}`, `Intraday graph of the ${subject}`);

async function findIndexRow(ctx: RouteContext, indexName: string): Promise<SubIndexRow | null> {
  const [subIndices, indices] = await Promise.all([
    ctx.fetcher.fetch("/NepseSubIndices"),
    ctx.fetcher.fetch("/NepseIndex"),
  ]);
  return (
    indexRowsByLabel(subIndices, "subIndices", log).get(indexName) ??
    indexRowsByLabel(indices, "indices", log).get(indexName) ??
    null
  );
}

export const ROUTES = {
  // Market data
  Summary: {
    kind: "passthrough",
    path: "/Summary",
    description: "Market summary: turnover, traded shares, transactions, scrips traded",
    transform: summaryToRecord,
  },
  LiveMarket: passthrough("/LiveMarket", "Live trading data for every scrip", "open"),
  PriceVolume: passthrough("/PriceVolume", "Price and volume for every scrip"),
  TopGainers: passthrough("/TopGainers", "Top gaining scrips"),
  TopLosers: passthrough("/TopLosers", "Top losing scrips"),
  TopTenTradeScrips: passthrough("/TopTenTradeScrips", "Top ten scrips by shares traded"),
  TopTenTransactionScrips: passthrough("/TopTenTransactionScrips", "Top ten scrips by transactions"),
  TopTenTurnoverScrips: passthrough("/TopTenTurnoverScrips", "Top ten scrips by turnover"),
  SupplyDemand: passthrough("/SupplyDemand", "Aggregate buy and sell pressure", "open"),
  IsNepseOpen: passthrough("/IsNepseOpen", "Market open/closed status"),
  NepseIndex: {
    kind: "passthrough",
    path: "/NepseIndex",
    description: "Headline indices keyed by index name",
    transform: keyByIndex,
  },
  NepseSubIndices: {
    kind: "passthrough",
    path: "/NepseSubIndices",
    description: "Sector sub-indices keyed by index name",
    transform: keyByIndex,
  },
  CompanyList: passthrough("/CompanyList", "Every listed company"),
  SectorScrips: passthrough("/SectorScrips", "Symbols grouped by sector"),
  SecurityList: passthrough("/SecurityList", "Every listed security"),
  Floorsheet: passthrough("/Floorsheet", "Full trade book for the last session", "closed"),

  // Per-symbol
  MarketDepth: {
    kind: "parameterized",
    path: "/MarketDepth",
    params: SYMBOL,
    marketState: "open",
    description: "Order book depth for a symbol",
  },
  DailyScripPriceGraph: {
    kind: "parameterized",
    path: "/DailyScripPriceGraph",
    params: SYMBOL,
    description: "Intraday price graph for a symbol",
  },
  CompanyDetails: {
    kind: "parameterized",
    path: "/CompanyDetails",
    params: SYMBOL,
    description: "Company profile and latest trading figures",
  },
  PriceVolumeHistory: {
    kind: "parameterized",
    path: "/PriceVolumeHistory",
    params: SYMBOL,
    description: "Historical price and volume for a symbol",
  },
  FloorsheetOf: {
    kind: "parameterized",
    path: "/FloorsheetOf",
    params: SYMBOL,
    marketState: "closed",
    description: "Trade book for a symbol from the last session",
  },

  // Daily graphs
  DailyNepseIndexGraph: dailyGraph("DailyNepseIndexGraph", "NEPSE index"),
  DailySensitiveIndexGraph: dailyGraph("DailySensitiveIndexGraph", "sensitive index"),
  DailyFloatIndexGraph: dailyGraph("DailyFloatIndexGraph", "float index"),
  DailySensitiveFloatIndexGraph: dailyGraph("DailySensitiveFloatIndexGraph", "sensitive float index"),
  DailyBankSubindexGraph: dailyGraph("DailyBankSubindexGraph", "banking sub-index"),
  DailyDevelopmentBankSubindexGraph: dailyGraph("DailyDevelopmentBankSubindexGraph", "development bank sub-index"),
  DailyFinanceSubindexGraph: dailyGraph("DailyFinanceSubindexGraph", "finance sub-index"),
  DailyHotelTourismSubindexGraph: dailyGraph("DailyHotelTourismSubindexGraph", "hotels and tourism sub-index"),
  DailyHydroPowerSubindexGraph: dailyGraph("DailyHydroPowerSubindexGraph", "hydropower sub-index"),
  DailyInvestmentSubindexGraph: dailyGraph("DailyInvestmentSubindexGraph", "investment sub-index"),
  DailyLifeInsuranceSubindexGraph: dailyGraph("DailyLifeInsuranceSubindexGraph", "life insurance sub-index"),
  DailyManufacturingProcessingSubindexGraph: dailyGraph(
    "DailyManufacturingProcessingSubindexGraph",
    "manufacturing and processing sub-index",
  ),
  DailyMicrofinanceSubindexGraph: dailyGraph("DailyMicrofinanceSubindexGraph", "microfinance sub-index"),
  DailyMutualFundSubindexGraph: dailyGraph("DailyMutualFundSubindexGraph", "mutual fund sub-index"),
  DailyNonLifeInsuranceSubindexGraph: dailyGraph("DailyNonLifeInsuranceSubindexGraph", "non-life insurance sub-index"),
  DailyOthersSubindexGraph: dailyGraph("DailyOthersSubindexGraph", "others sub-index"),
  DailyTradingSubindexGraph: dailyGraph("DailyTradingSubindexGraph", "trading sub-index"),

  // Composites
  TradeTurnoverTransactionSubindices: {
    kind: "composite",
    description: "Per-scrip details joined across market lists, with per-sector rollups",
    run: (ctx) => buildMarketOverview(ctx.fetcher),
  },
  SubIndex: {
    kind: "composite",
    params: [{ name: "index", kind: "index" }],
    description: "Live row of a single index or sub-index; row is null when the name has no live row",
    run: async (ctx, params) => {
      const indexName = params["index"] ?? "";
      return { index: indexName, row: await findIndexRow(ctx, indexName) };
    },
  },
  Health: {
    kind: "composite",
    description: "Gateway liveness",
    run: () => ({ status: "healthy" }),
  },
  ValidateStock: {
    kind: "composite",
    params: [{ name: "symbol", kind: "text", optional: true }],
    description: "Check whether a symbol is listed, with suggestions when it is not",
    run: (ctx, params) => ctx.validator.validateStockSymbol(params["symbol"]),
  },
  ValidateIndex: {
    kind: "composite",
    params: [{ name: "index", kind: "text", optional: true }],
    description: "Check whether an index name is known",
    run: (ctx, params) => ctx.validator.validateIndexName(params["index"]),
  },
  ValidationStats: {
    kind: "composite",
    description: "Counts and samples of known symbols and indices",
    run: (ctx) => ctx.validator.stats(),
  },
  RateLimitStats: {
    kind: "composite",
    description: "Rate limiter state",
    run: (ctx) => ctx.limiter.stats(),
  },
  FindSymbolByCompanyName: {
    kind: "composite",
    params: [{ name: "query", kind: "text" }],
    description: "Search symbols by company name",
    run: (ctx, params) => ctx.validator.findSymbolByCompanyName(params["query"] ?? ""),
  },
  FindCompanyNameBySymbol: {
    kind: "composite",
    params: [{ name: "symbol", kind: "text" }],
    description: "Company name for a symbol",
    run: (ctx, params) => ctx.validator.findCompanyNameBySymbol(params["symbol"] ?? ""),
  },
} satisfies Record<string, RouteDescriptor>;

export type RouteName = keyof typeof ROUTES;

export const ROUTE_NAMES = Object.keys(ROUTES).filter(isRouteName);

export function isRouteName(name: string): name is RouteName {
  return Object.hasOwn(ROUTES, name);
}

export function getRoute(name: RouteName): RouteDescriptor {
  return ROUTES[name];
}

export function paramsOf(route: RouteDescriptor): readonly ParamSpec[] {
  return route.kind === "passthrough" ? [] : route.params ?? [];
}
