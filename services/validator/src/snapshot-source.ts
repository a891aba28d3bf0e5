/**
 * Snapshot file reader.
 * The snapshot is the flat symbol → { name, sector, internalSector } map
 * written by the snapshot updater.
 */
import { readFileSync } from "node:fs";
import { z } from "zod";
import { createLogger } from "../../shared/src/logger.js";
import type { StockMap } from "../../shared/src/types.js";

const log = createLogger("stock-snapshot");

export const stockRecordSchema = z.object({
  name: z.string(),
  sector: z.string(),
  internalSector: z.string(),
});

export const stockMapSchema = z.record(z.string(), stockRecordSchema);

export type SnapshotSource = () => StockMap;

/**
 * Read the snapshot from disk. A missing or unreadable file yields an empty
 * map so that validation degrades to "nothing is known" instead of failing.
 */
export function fileSnapshotSource(path: string): SnapshotSource {
  return () => {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (err) {
      log.warn("Stock snapshot not readable", { path, error: err instanceof Error ? err.message : String(err) });
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn("Stock snapshot is not valid JSON", { path, error: err instanceof Error ? err.message : String(err) });
      return {};
    }

    const parsed = stockMapSchema.safeParse(json);
    if (!parsed.success) {
      log.warn("Stock snapshot failed schema validation", {
        path,
        issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      return {};
    }

    log.info("Stock snapshot loaded", { path, symbols: Object.keys(parsed.data).length });
    return parsed.data;
  };
}

export function staticSnapshotSource(stocks: StockMap): SnapshotSource {
  return () => stocks;
}
