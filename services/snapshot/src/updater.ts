/**
 * Snapshot Updater
 *
 * Rebuilds the stock snapshot from the upstream security list and sector
 * membership, then replaces the snapshot file atomically (temp file + rename)
 * so readers never observe a partial write.
 */
import { mkdir, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createLogger } from "../../shared/src/logger.js";
import type { StockMap, StockRecord } from "../../shared/src/types.js";
import { internalSectorFor, UNKNOWN_SECTOR } from "./sectors.js";

const log = createLogger("snapshot-updater");

export const SECURITY_LIST_PATH = "/SecurityList";
export const SECTOR_SCRIPS_PATH = "/SectorScrips";

/** The parts of the Upstream Client the updater needs. */
export interface SnapshotUpstream {
  get(path: string): Promise<unknown>;
  isHealthy(healthPath?: string): Promise<boolean>;
}

export interface SnapshotUpdaterConfig {
  outPath: string;
  healthPath?: string;
}

/** Reverse the sector → symbols payload into symbol → sector. */
export function buildSymbolSectorIndex(sectorScrips: unknown): Map<string, string> {
  const index = new Map<string, string>();
  if (!isRecord(sectorScrips)) return index;

  for (const [sector, symbols] of Object.entries(sectorScrips)) {
    if (!Array.isArray(symbols)) continue;
    for (const symbol of symbols) {
      if (typeof symbol === "string") index.set(symbol, sector);
    }
  }
  return index;
}

/** Active securities with a string symbol, in security-list order. */
export function buildStockMap(securityList: unknown, symbolSectors: Map<string, string>): StockMap {
  if (!Array.isArray(securityList)) return {};

  const stocks = new Map<string, StockRecord>();

  for (const item of securityList) {
    if (!isRecord(item)) continue;
    const symbol = item["symbol"];
    if (item["activeStatus"] !== "A" || typeof symbol !== "string" || !symbol) continue;

    const sector = symbolSectors.get(symbol) ?? UNKNOWN_SECTOR;
    const securityName = item["securityName"];
    stocks.set(symbol, {
      name: typeof securityName === "string" && securityName ? securityName : symbol,
      sector,
      internalSector: internalSectorFor(sector),
    });
  }
  return Object.fromEntries(stocks);
}

export class SnapshotUpdater {
  private running: Promise<boolean> | null = null;

  constructor(
    private upstream: SnapshotUpstream,
    private config: SnapshotUpdaterConfig,
  ) {}

  /** Rebuild the snapshot; resolves false on any failure and never rejects. */
  update(): Promise<boolean> {
    // Overlapping runs would race on the temp file
    if (!this.running) {
      this.running = this.run().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async run(): Promise<boolean> {
    const { outPath, healthPath } = this.config;
    log.info("Snapshot update started", { outPath });

    if (!(await this.upstream.isHealthy(healthPath))) {
      log.error("Upstream is not healthy; snapshot left unchanged", { outPath });
      return false;
    }

    try {
      const [securityList, sectorScrips] = await Promise.all([
        this.upstream.get(SECURITY_LIST_PATH),
        this.upstream.get(SECTOR_SCRIPS_PATH),
      ]);
      log.info("Snapshot sources fetched", {
        securities: Array.isArray(securityList) ? securityList.length : 0,
        sectors: isRecord(sectorScrips) ? Object.keys(sectorScrips).length : 0,
      });

      const symbolSectors = buildSymbolSectorIndex(sectorScrips);
      const stocks = buildStockMap(securityList, symbolSectors);
      const count = Object.keys(stocks).length;
      log.info("Stock map built", { symbols: count, mappedSymbols: symbolSectors.size });

      if (count === 0) {
        log.error("Refusing to write an empty snapshot", { outPath });
        return false;
      }

      await writeAtomically(outPath, `${JSON.stringify(stocks, null, 2)}\n`);
      log.info("Snapshot written", { outPath, symbols: count });
      return true;
    } catch (err) {
      log.error("Snapshot update failed", { outPath, error: err instanceof Error ? err.message : String(err) });
      return false;
    }
  }
}

async function writeAtomically(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, contents, "utf-8");
  await rename(tmp, path);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
