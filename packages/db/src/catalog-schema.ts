import { sql } from "drizzle-orm";
import type { CatalogRecord } from "@lorekeeper/shared";
import type { Database } from "./client.js";
import { catalog, type NewCatalogRow } from "./schema/index.js";

/** Rows per INSERT statement during import. */
export const UPSERT_BATCH_SIZE = 500;

/**
 * Create the `catalog` table and its indexes if they do not exist yet.
 * Mirrors `schema/catalog.ts`.
 */
export async function ensureCatalogSchema(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS catalog (
      type TEXT NOT NULL,
      name TEXT,
      slug_or_index TEXT NOT NULL,
      api_url TEXT,
      document_slug TEXT,
      document_title TEXT,
      subtype TEXT,
      raw JSONB,
      CONSTRAINT catalog_pk PRIMARY KEY (type, slug_or_index)
    )
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS catalog_name_idx ON catalog (name)`);
  await db.execute(
    sql`CREATE INDEX IF NOT EXISTS catalog_type_doc_idx ON catalog (type, document_slug)`,
  );
  await db.execute(
    sql`CREATE INDEX IF NOT EXISTS catalog_type_name_idx ON catalog (type, name)`,
  );
}

export function toCatalogRow(record: CatalogRecord): NewCatalogRow {
  return {
    type: record.type,
    name: record.name,
    slugOrIndex: record.slug_or_index,
    apiUrl: record.api_url,
    documentSlug: record.document_slug,
    documentTitle: record.document_title,
    subtype: record.subtype ?? null,
    raw: record.raw ?? null,
  };
}

/**
 * Collapse rows sharing a (type, slug) key. The last one wins, like
 * the builder's INSERT OR REPLACE. Postgres rejects a single upsert that
 * touches the same key twice.
 */
export function dedupeRows(rows: NewCatalogRow[]): NewCatalogRow[] {
  const byKey = new Map<string, NewCatalogRow>();
  for (const row of rows) {
    byKey.set(`${row.type}\u0000${row.slugOrIndex}`, row);
  }
  return [...byKey.values()];
}

/** Insert or replace a batch of catalog rows. Returns the number written. */
export async function upsertCatalogRows(
  db: Database,
  rows: NewCatalogRow[],
): Promise<number> {
  const unique = dedupeRows(rows);
  if (unique.length === 0) return 0;

  await db
    .insert(catalog)
    .values(unique)
    .onConflictDoUpdate({
      target: [catalog.type, catalog.slugOrIndex],
      set: {
        name: sql`excluded.name`,
        apiUrl: sql`excluded.api_url`,
        documentSlug: sql`excluded.document_slug`,
        documentTitle: sql`excluded.document_title`,
        subtype: sql`excluded.subtype`,
        raw: sql`excluded.raw`,
      },
    });

  return unique.length;
}
