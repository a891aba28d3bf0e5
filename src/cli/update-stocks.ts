/**
 * update-stocks - rebuild the stock snapshot once
 *
 * Usage:
 *   nepse-gateway update-stocks
 *   nepse-gateway update-stocks --api-url http://localhost:8000 --out data/stockmap.json --verbose
 */
import type { Command } from "commander";
import { loadConfig, setLogLevel, snapshotConfigSchema } from "../../services/shared/src/index.js";
import { SnapshotUpdater } from "../../services/snapshot/src/index.js";
import { UpstreamClient } from "../../services/upstream/src/index.js";

interface UpdateStocksOptions {
  apiUrl?: string;
  out?: string;
  verbose?: boolean;
}

export function registerUpdateStocksCli(program: Command) {
  program
    .command("update-stocks")
    .description("Rebuild the symbol snapshot from the upstream security list")
    .option("--api-url <url>", "Upstream base URL (defaults to UPSTREAM_BASE_URL)")
    .option("--out <path>", "Snapshot file (defaults to STOCK_MAP_PATH)")
    .option("--verbose", "Log every phase at debug level", false)
    .action(async (opts: UpdateStocksOptions) => {
      if (opts.verbose) setLogLevel("debug");

      const config = loadConfig(snapshotConfigSchema);
      const upstream = new UpstreamClient({
        baseUrl: opts.apiUrl ?? config.UPSTREAM_BASE_URL,
        timeoutMs: config.SNAPSHOT_TIMEOUT_MS,
        retries: config.UPSTREAM_RETRIES,
      });
      const updater = new SnapshotUpdater(upstream, {
        outPath: opts.out ?? config.STOCK_MAP_PATH,
        healthPath: config.UPSTREAM_HEALTH_PATH,
      });

      const ok = await updater.update();
      process.exit(ok ? 0 : 1);
    });
}
