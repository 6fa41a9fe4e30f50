// ---------------------------------------------------------------------------
// @lorekeeper/db: barrel export
// ---------------------------------------------------------------------------

// Schema tables
export { catalog, type CatalogRow, type NewCatalogRow } from "./schema/index.js";

// Client factory + types
export { createDb, type Database } from "./client.js";

// Table bootstrap + import helpers
export {
  dedupeRows,
  ensureCatalogSchema,
  toCatalogRow,
  UPSERT_BATCH_SIZE,
  upsertCatalogRows,
} from "./catalog-schema.js";

// Flat JSONL catalog files
export {
  catalogFilePath,
  nameIndexFilePath,
  parseCatalogLine,
  readCatalogRecords,
} from "./catalog-files.js";
