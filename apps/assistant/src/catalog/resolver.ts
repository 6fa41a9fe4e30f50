// ---------------------------------------------------------------------------
// Resolver: name or slug -> unique slug + locator
// ---------------------------------------------------------------------------

import type {
  CatalogEntry,
  ResolvedReference,
  ResourceType,
} from "@lorekeeper/shared";
import type { Logger } from "pino";
import { fail, ok, ToolError, type Result } from "../lib/errors.js";
import type { CatalogStore } from "./catalog-store.js";
import type { FlatFileCatalog } from "./flat-file.js";
import type { NameIndexStore } from "./name-index.js";

export interface ResolverDeps {
  store: CatalogStore;
  flatFile: FlatFileCatalog;
  nameIndex: NameIndexStore;
  logger?: Logger;
}

function toReference(entry: CatalogEntry): ResolvedReference {
  return {
    chosen_name: entry.name,
    chosen_slug: entry.slug,
    api_url: entry.apiUrl,
  };
}

export class Resolver {
  private store: CatalogStore;
  private flatFile: FlatFileCatalog;
  private nameIndex: NameIndexStore;
  private logger: Logger | undefined;

  constructor(deps: ResolverDeps) {
    this.store = deps.store;
    this.flatFile = deps.flatFile;
    this.nameIndex = deps.nameIndex;
    this.logger = deps.logger;
  }

  /**
   * Resolve a catalog entry, first tier that answers wins:
   *
   *   1. the input as a slug in the indexed store (trusted verbatim);
   *   2. exact slug/name match in the type's JSONL file;
   *   3. the input as a display name in the type's name index; the first
   *      candidate found is kept unless one belongs to `preferDoc`.
   *
   * Candidate order in tier 3 is the index's insertion order, which is
   * arbitrary rather than a relevance ranking.
   */
  async resolve(
    type: ResourceType,
    nameOrSlug: string,
    preferDoc?: string | null,
  ): Promise<Result<ResolvedReference>> {
    const apiUrl = await this.store.getApiUrl(type, nameOrSlug);
    if (apiUrl) {
      this.logger?.debug({ type, nameOrSlug, tier: "indexed" }, "Resolved");
      return ok({ chosen_name: nameOrSlug, chosen_slug: nameOrSlug, api_url: apiUrl });
    }

    const hit = await this.flatFile.findBySlugOrName(type, nameOrSlug);
    if (hit) {
      this.logger?.debug({ type, nameOrSlug, tier: "flat_file" }, "Resolved");
      return ok(toReference(hit));
    }

    for (const slugs of await this.nameIndex.candidateGroups(type, nameOrSlug)) {
      const best = await this.pickCandidate(type, slugs, preferDoc ?? null);
      if (best) {
        this.logger?.debug(
          { type, nameOrSlug, tier: "name_index", slug: best.slug },
          "Resolved",
        );
        return ok(toReference(best));
      }
    }

    return fail(new ToolError("not_found", `not found: ${type} / ${nameOrSlug}`));
  }

  private async pickCandidate(
    type: ResourceType,
    slugs: string[],
    preferDoc: string | null,
  ): Promise<CatalogEntry | null> {
    let best: CatalogEntry | null = null;

    for (const slug of slugs) {
      const entry = await this.flatFile.findBySlugOrName(type, slug);
      if (!entry) continue;
      if (!best) best = entry;
      if (preferDoc && entry.documentSlug === preferDoc) {
        return entry;
      }
    }

    return best;
  }
}
