// ---------------------------------------------------------------------------
// Flat-file catalog: exact-match scan over `<type>.jsonl`
// ---------------------------------------------------------------------------

import {
  catalogFilePath,
  readCatalogRecords,
} from "@lorekeeper/db";
import { toCatalogEntry, type CatalogEntry } from "@lorekeeper/shared";

export class FlatFileCatalog {
  constructor(private dataDir: string) {}

  /**
   * First entry whose slug or name equals `nameOrSlug` (trimmed,
   * case-insensitive), in file order.
   */
  async findBySlugOrName(
    type: string,
    nameOrSlug: string,
  ): Promise<CatalogEntry | null> {
    const key = nameOrSlug.trim().toLowerCase();
    const path = catalogFilePath(this.dataDir, type);

    for await (const record of readCatalogRecords(path)) {
      const name = (record.name ?? "").trim().toLowerCase();
      const slug = record.slug_or_index.trim().toLowerCase();
      if (key === slug || key === name) {
        return toCatalogEntry(record);
      }
    }

    return null;
  }
}
