/**
 * validator — Barrel exports
 */
export { StockValidator } from "./validator.js";
export { INDEX_NAMES } from "./indices.js";
export { companyKey, stripCorporateSuffix, firstSignificantWord } from "./company-search.js";
export {
  fileSnapshotSource,
  staticSnapshotSource,
  stockMapSchema,
  stockRecordSchema,
  type SnapshotSource,
} from "./snapshot-source.js";
