import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "./schema/index.js";

/**
 * Open the indexed catalog database: a Drizzle instance over the `catalog`
 * table, backed by a node-postgres pool. The import-catalog script writes
 * through it and the assistant's `PgCatalogStore` reads through it; both
 * end the returned `pool` on exit.
 */
export function createDb(connectionString: string) {
  const pool = new pg.Pool({ connectionString });
  const db = drizzle(pool, { schema });
  return { db, pool };
}

/** Drizzle instance typed with the catalog schema. */
export type Database = ReturnType<typeof createDb>["db"];
