// ---------------------------------------------------------------------------
// Indexed catalog store: point lookups by (type, slug)
// ---------------------------------------------------------------------------

import { and, eq } from "drizzle-orm";
import { catalog, type Database } from "@lorekeeper/db";

export interface CatalogStore {
  /** Locator for (type, slug), or `null` when the store has no usable row. */
  getApiUrl(type: string, slug: string): Promise<string | null>;
}

export class PgCatalogStore implements CatalogStore {
  constructor(private db: Database) {}

  async getApiUrl(type: string, slug: string): Promise<string | null> {
    const rows = await this.db
      .select({ apiUrl: catalog.apiUrl })
      .from(catalog)
      .where(and(eq(catalog.type, type), eq(catalog.slugOrIndex, slug)))
      .limit(1);

    return rows[0]?.apiUrl || null;
  }
}

/**
 * Stand-in used when Postgres is unreachable at startup: every lookup
 * misses, so resolution falls through to the flat files.
 */
export class NullCatalogStore implements CatalogStore {
  async getApiUrl(): Promise<string | null> {
    return null;
  }
}
