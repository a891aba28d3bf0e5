/**
 * Composite Aggregator
 *
 * Joins the company list with the top-N lists, gainers/losers, price-volume
 * and sub-indices by symbol into per-scrip details and per-sector rollups.
 *
 * A scrip whose last traded price or previous close is 0 is not trading and
 * is dropped before the rollup; downstream consumers rely on this.
 */
import { z } from "zod";
import { createLogger, type Logger } from "../../shared/src/logger.js";
import type {
  MarketOverview,
  ScripDetail,
  SectorDetail,
  SubIndexRow,
} from "../../shared/src/types.js";
import type { JsonFetcher } from "../../upstream/src/cache.js";
import { SECTOR_SUBINDEX_MAP } from "./sectors.js";

const defaultLog = createLogger("aggregator");

export const OVERVIEW_SOURCE_PATHS = {
  companies: "/CompanyList",
  topTurnover: "/TopTenTurnoverScrips",
  topTransaction: "/TopTenTransactionScrips",
  topTrade: "/TopTenTradeScrips",
  gainers: "/TopGainers",
  losers: "/TopLosers",
  priceVolume: "/PriceVolume",
  subIndices: "/NepseSubIndices",
} as const;

export type OverviewSources = Record<keyof typeof OVERVIEW_SOURCE_PATHS, unknown>;

// ─── Row Schemas ──────────────────────────────────────────────────────
// Missing or non-numeric figures read as 0.

const amount = () => z.number().catch(0);
const symbol = z.string().min(1);

const companyRow = z.object({
  symbol,
  sectorName: z.string().min(1),
  securityName: z.string().catch(""),
  instrumentType: z.string().nullable().catch(null),
});

const turnoverRow = z.object({ symbol, turnover: amount() });
const transactionRow = z.object({ symbol, totalTrades: amount() });
const tradeRow = z.object({ symbol, shareTraded: amount() });

const moverRow = z.object({
  symbol,
  pointChange: amount(),
  percentageChange: amount(),
  ltp: amount(),
});

const priceVolumeRow = z.object({
  symbol,
  previousClose: amount(),
  lastUpdatedDateTime: z.union([z.string(), z.number()]).catch(0),
});

export const subIndexRow = z.object({ index: z.string().min(1) }).passthrough();

/** Parse a collection, keeping the rows that fit and logging the rest. */
function rowsOf<S extends z.ZodTypeAny>(payload: unknown, schema: S, source: string, log: Logger): z.infer<S>[] {
  if (!Array.isArray(payload)) {
    log.integrity("collection is not an array", { source, received: payload === null ? "null" : typeof payload });
    return [];
  }

  const rows: z.infer<S>[] = [];
  let skipped = 0;
  for (const item of payload) {
    const parsed = schema.safeParse(item);
    if (parsed.success) rows.push(parsed.data);
    else skipped++;
  }
  if (skipped > 0) {
    log.integrity("rows skipped", { source, skipped, kept: rows.length });
  }
  return rows;
}

/** Later rows win when a key repeats. */
function keyBy<T>(rows: T[], key: (row: T) => string): Map<string, T> {
  const map = new Map<string, T>();
  for (const row of rows) map.set(key(row), row);
  return map;
}

const bySymbol = <T extends { symbol: string }>(rows: T[]) => keyBy(rows, (r) => r.symbol);

/** Rows of an index payload keyed by their `index` label. */
export function indexRowsByLabel(payload: unknown, source: string, log: Logger = defaultLog): Map<string, SubIndexRow> {
  return keyBy(rowsOf(payload, subIndexRow, source, log), (r) => r.index);
}

// ─── Merge ────────────────────────────────────────────────────────────

export function mergeMarketOverview(sources: OverviewSources, log: Logger = defaultLog): MarketOverview {
  const companies = bySymbol(rowsOf(sources.companies, companyRow, "companies", log));
  const turnover = bySymbol(rowsOf(sources.topTurnover, turnoverRow, "topTurnover", log));
  const transaction = bySymbol(rowsOf(sources.topTransaction, transactionRow, "topTransaction", log));
  const trade = bySymbol(rowsOf(sources.topTrade, tradeRow, "topTrade", log));
  const gainers = bySymbol(rowsOf(sources.gainers, moverRow, "gainers", log));
  const losers = bySymbol(rowsOf(sources.losers, moverRow, "losers", log));
  const priceVolume = bySymbol(rowsOf(sources.priceVolume, priceVolumeRow, "priceVolume", log));
  const subIndices = indexRowsByLabel(sources.subIndices, "subIndices", log);

  // Keys come from upstream data, so collect into Maps rather than plain objects
  const scrips = new Map<string, ScripDetail>();
  for (const [sym, company] of companies) {
    const prices = priceVolume.get(sym);
    // Gainers take precedence when a symbol appears in both lists
    const mover = gainers.get(sym) ?? losers.get(sym);

    const detail: ScripDetail = {
      symbol: sym,
      sector: company.sectorName,
      Turnover: turnover.get(sym)?.turnover ?? 0,
      transaction: transaction.get(sym)?.totalTrades ?? 0,
      volume: trade.get(sym)?.shareTraded ?? 0,
      previousClose: prices?.previousClose ?? 0,
      lastUpdatedDateTime: prices?.lastUpdatedDateTime ?? 0,
      name: company.securityName,
      category: company.instrumentType,
      pointChange: mover?.pointChange ?? 0,
      percentageChange: mover?.percentageChange ?? 0,
      ltp: mover?.ltp ?? 0,
    };

    if (detail.ltp === 0 || detail.previousClose === 0) continue;
    scrips.set(sym, detail);
  }

  const sectors = new Map<string, SectorDetail>();
  for (const company of companies.values()) {
    const sector = company.sectorName;
    if (sectors.has(sector)) continue;
    sectors.set(sector, {
      transaction: 0,
      volume: 0,
      totalTurnover: 0,
      turnover: subIndexFor(sector, subIndices, log),
      sectorName: sector,
    });
  }

  for (const scrip of scrips.values()) {
    const rollup = sectors.get(scrip.sector);
    if (!rollup) continue;
    rollup.transaction += scrip.transaction;
    rollup.volume += scrip.volume;
    rollup.totalTurnover += scrip.Turnover;
  }

  return { scripsDetails: Object.fromEntries(scrips), sectorsDetails: Object.fromEntries(sectors) };
}

function subIndexFor(sector: string, subIndices: Map<string, SubIndexRow>, log: Logger): SubIndexRow | null {
  const label = Object.hasOwn(SECTOR_SUBINDEX_MAP, sector) ? SECTOR_SUBINDEX_MAP[sector] : undefined;
  if (label === undefined) {
    log.integrity("sector has no sub-index mapping", { sector });
    return null;
  }
  const row = subIndices.get(label);
  if (!row) {
    log.integrity("mapped sub-index missing from payload", { sector, label });
    return null;
  }
  return row;
}

/** Fetch every source concurrently through the cache and merge. */
export async function buildMarketOverview(fetcher: JsonFetcher, log: Logger = defaultLog): Promise<MarketOverview> {
  const [companies, topTurnover, topTransaction, topTrade, gainers, losers, priceVolume, subIndices] =
    await Promise.all([
      fetcher.fetch(OVERVIEW_SOURCE_PATHS.companies),
      fetcher.fetch(OVERVIEW_SOURCE_PATHS.topTurnover),
      fetcher.fetch(OVERVIEW_SOURCE_PATHS.topTransaction),
      fetcher.fetch(OVERVIEW_SOURCE_PATHS.topTrade),
      fetcher.fetch(OVERVIEW_SOURCE_PATHS.gainers),
      fetcher.fetch(OVERVIEW_SOURCE_PATHS.losers),
      fetcher.fetch(OVERVIEW_SOURCE_PATHS.priceVolume),
      fetcher.fetch(OVERVIEW_SOURCE_PATHS.subIndices),
    ]);

  const overview = mergeMarketOverview(
    { companies, topTurnover, topTransaction, topTrade, gainers, losers, priceVolume, subIndices },
    log,
  );
  log.debug("Market overview built", {
    scrips: Object.keys(overview.scripsDetails).length,
    sectors: Object.keys(overview.sectorsDetails).length,
  });
  return overview;
}
