// ---------------------------------------------------------------------------
// Name index: display name -> candidate slugs, built offline
// ---------------------------------------------------------------------------

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { nameIndexFilePath } from "@lorekeeper/db";
import {
  NameIndex,
  type CatalogRecord,
  type LookupMatch,
} from "@lorekeeper/shared";
import { formatZodIssues } from "../lib/errors.js";

/**
 * Read-only access to the per-type name index files. Each file is read
 * once per store instance; a type without a file has no index.
 */
export class NameIndexStore {
  private loaded = new Map<string, NameIndex | null>();

  constructor(private dataDir: string) {}

  async load(type: string): Promise<NameIndex | null> {
    const cached = this.loaded.get(type);
    if (cached !== undefined) return cached;

    const path = nameIndexFilePath(this.dataDir, type);
    let index: NameIndex | null = null;

    if (existsSync(path)) {
      const json: unknown = JSON.parse(await readFile(path, "utf-8"));
      const parsed = NameIndex.safeParse(json);
      if (!parsed.success) {
        throw new Error(
          `Name index ${path} is malformed: ${formatZodIssues(parsed.error)}`,
        );
      }
      index = parsed.data;
    }

    this.loaded.set(type, index);
    return index;
  }

  /**
   * Substring match (case-insensitive) over display names, in index
   * order, capped at `limit`.
   */
  async search(type: string, query: string, limit: number): Promise<LookupMatch[]> {
    const index = await this.load(type);
    if (!index) return [];

    const q = query.trim().toLowerCase();
    const matches: LookupMatch[] = [];

    for (const [name, slugs] of Object.entries(index)) {
      if (!name.toLowerCase().includes(q)) continue;
      matches.push({ name, slugs });
      if (matches.length >= limit) break;
    }

    return matches;
  }

  /**
   * Candidate slug lists of every display name equal to `name` (trimmed,
   * case-insensitive), in index order. Names with no slugs are skipped.
   */
  async candidateGroups(type: string, name: string): Promise<string[][]> {
    const index = await this.load(type);
    if (!index) return [];

    const key = name.trim().toLowerCase();
    return Object.entries(index)
      .filter(([n, slugs]) => n.trim().toLowerCase() === key && slugs.length > 0)
      .map(([, slugs]) => slugs);
  }
}

/**
 * Rebuild a name index from catalog records: first-seen name order,
 * first-seen slug order, no duplicate slugs per name.
 */
export async function buildNameIndex(
  records: AsyncIterable<CatalogRecord> | Iterable<CatalogRecord>,
): Promise<NameIndex> {
  const table = new Map<string, string[]>();

  for await (const record of records) {
    const name = record.name;
    const slug = record.slug_or_index;
    if (!name || !slug) continue;

    const slugs = table.get(name) ?? [];
    if (!slugs.includes(slug)) slugs.push(slug);
    table.set(name, slugs);
  }

  return Object.fromEntries(table);
}
