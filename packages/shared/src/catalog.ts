import { z } from "zod";

// ---------------------------------------------------------------------------
// One line of a per-type JSONL catalog file (written by the offline builder)
// ---------------------------------------------------------------------------

/**
 * `type` is free text: merged files (equipment) carry the upstream
 * sub-collection name (`armor`, `weapons`, `magicitems`) per line.
 */
export const CatalogRecord = z.object({
  type: z.string(),
  name: z.string().nullable().default(null),
  slug_or_index: z.string().min(1),
  api_url: z.string().nullable().default(null),
  document_slug: z.string().nullable().default(null),
  document_title: z.string().nullable().default(null),
  subtype: z.string().nullable().optional(),
  raw: z.unknown().optional(),
});
export type CatalogRecord = z.infer<typeof CatalogRecord>;

/** Normalized catalog entry. Identity = (type, slug). */
export interface CatalogEntry {
  type: string;
  name: string;
  slug: string;
  apiUrl: string | null;
  documentSlug: string | null;
  documentTitle: string | null;
}

export function toCatalogEntry(record: CatalogRecord): CatalogEntry {
  return {
    type: record.type,
    name: record.name ?? "",
    slug: record.slug_or_index,
    apiUrl: record.api_url,
    documentSlug: record.document_slug,
    documentTitle: record.document_title,
  };
}

// ---------------------------------------------------------------------------
// Name index: display name -> ordered candidate slugs
// ---------------------------------------------------------------------------
export const NameIndex = z.record(z.array(z.string()));
export type NameIndex = z.infer<typeof NameIndex>;

export const LookupMatch = z.object({
  name: z.string(),
  slugs: z.array(z.string()),
});
export type LookupMatch = z.infer<typeof LookupMatch>;

// ---------------------------------------------------------------------------
// Resolver output
// ---------------------------------------------------------------------------

/** `api_url` is null only when the catalog line itself carries none. */
export const ResolvedReference = z.object({
  chosen_name: z.string(),
  chosen_slug: z.string(),
  api_url: z.string().nullable(),
});
export type ResolvedReference = z.infer<typeof ResolvedReference>;

// ---------------------------------------------------------------------------
// Persisted detail record: cache/<type>/<slug>.json
// ---------------------------------------------------------------------------
export const CachedDetail = z
  .object({
    slug: z.string(),
    api_url: z.string(),
    data: z.unknown(),
  })
  .passthrough();
export type CachedDetail = z.infer<typeof CachedDetail>;
