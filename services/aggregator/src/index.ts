/**
 * aggregator — Barrel exports
 */
export {
  buildMarketOverview,
  mergeMarketOverview,
  indexRowsByLabel,
  subIndexRow,
  OVERVIEW_SOURCE_PATHS,
  type OverviewSources,
} from "./overview.js";
export { SECTOR_SUBINDEX_MAP } from "./sectors.js";
