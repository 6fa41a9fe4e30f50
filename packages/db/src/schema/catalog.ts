import {
  index,
  jsonb,
  pgTable,
  primaryKey,
  text,
} from "drizzle-orm/pg-core";

export const catalog = pgTable(
  "catalog",
  {
    type: text("type").notNull(),
    name: text("name"),
    slugOrIndex: text("slug_or_index").notNull(),
    apiUrl: text("api_url"),
    documentSlug: text("document_slug"),
    documentTitle: text("document_title"),
    subtype: text("subtype"),
    raw: jsonb("raw"),
  },
  (t) => [
    // Point lookups by (type, slug), the resolver's fast path
    primaryKey({ name: "catalog_pk", columns: [t.type, t.slugOrIndex] }),
    index("catalog_name_idx").on(t.name),
    index("catalog_type_doc_idx").on(t.type, t.documentSlug),
    index("catalog_type_name_idx").on(t.type, t.name),
  ],
);

export type CatalogRow = typeof catalog.$inferSelect;
export type NewCatalogRow = typeof catalog.$inferInsert;
