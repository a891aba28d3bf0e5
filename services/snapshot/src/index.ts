/**
 * snapshot — Barrel exports
 */
export {
  SnapshotUpdater,
  buildStockMap,
  buildSymbolSectorIndex,
  SECURITY_LIST_PATH,
  SECTOR_SCRIPS_PATH,
  type SnapshotUpstream,
  type SnapshotUpdaterConfig,
} from "./updater.js";
export { SnapshotScheduler } from "./scheduler.js";
export { INTERNAL_SECTOR_MAP, DEFAULT_INTERNAL_SECTOR, UNKNOWN_SECTOR, internalSectorFor } from "./sectors.js";
