// ---------------------------------------------------------------------------
// Fetch-cache: write-once detail records keyed by (type, slug)
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import { existsSync } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { CachedDetail, type ResourceType } from "@lorekeeper/shared";
import type { Logger } from "pino";
import type { CatalogStore } from "../catalog/catalog-store.js";
import type { FlatFileCatalog } from "../catalog/flat-file.js";
import type { HttpTransport } from "../http/transport.js";
import {
  fail,
  formatZodIssues,
  ok,
  RetrievalError,
  ToolError,
  type Result,
} from "../lib/errors.js";

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

export interface DetailStore {
  /** Stored record, or `null` on a miss. Throws `cache_corrupt` on bad content. */
  load(type: ResourceType, slug: string): Promise<CachedDetail | null>;
  save(type: ResourceType, slug: string, detail: CachedDetail): Promise<void>;
}

/** One pretty-printed JSON file per entry: `<root>/<type>/<slug>.json`. */
export class FileDetailStore implements DetailStore {
  constructor(private root: string) {}

  pathFor(type: ResourceType, slug: string): string {
    return join(this.root, type, `${encodeURIComponent(slug)}.json`);
  }

  async load(type: ResourceType, slug: string): Promise<CachedDetail | null> {
    const path = this.pathFor(type, slug);
    if (!existsSync(path)) return null;

    let json: unknown;
    try {
      json = JSON.parse(await readFile(path, "utf-8"));
    } catch {
      throw new ToolError("cache_corrupt", `cache file ${path} is not valid JSON`);
    }

    const parsed = CachedDetail.safeParse(json);
    if (!parsed.success) {
      throw new ToolError(
        "cache_corrupt",
        `cache file ${path} is malformed: ${formatZodIssues(parsed.error)}`,
      );
    }
    return parsed.data;
  }

  async save(type: ResourceType, slug: string, detail: CachedDetail): Promise<void> {
    const path = this.pathFor(type, slug);
    await mkdir(dirname(path), { recursive: true });

    // Readers never observe a half-written file; concurrent writers race
    // on the rename and the last one wins.
    const tmpPath = `${path}.${randomUUID()}.tmp`;
    await writeFile(tmpPath, JSON.stringify(detail, null, 2), "utf-8");
    await rename(tmpPath, path);
  }
}

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

export interface DetailCacheDeps {
  store: DetailStore;
  catalog: CatalogStore;
  flatFile: FlatFileCatalog;
  transport: HttpTransport;
  logger?: Logger;
}

export class DetailCache {
  private store: DetailStore;
  private catalog: CatalogStore;
  private flatFile: FlatFileCatalog;
  private transport: HttpTransport;
  private logger: Logger | undefined;

  constructor(deps: DetailCacheDeps) {
    this.store = deps.store;
    this.catalog = deps.catalog;
    this.flatFile = deps.flatFile;
    this.transport = deps.transport;
    this.logger = deps.logger;
  }

  /**
   * Return the stored detail for (type, slug) or retrieve and persist it.
   * A hit is returned as stored: there is no TTL and no revalidation.
   */
  async fetchDetail(type: ResourceType, slug: string): Promise<Result<CachedDetail>> {
    let cached: CachedDetail | null;
    try {
      cached = await this.store.load(type, slug);
    } catch (err) {
      if (err instanceof ToolError) return fail(err);
      throw err;
    }

    if (cached) {
      this.logger?.debug({ type, slug }, "Detail cache hit");
      return ok(cached);
    }

    const apiUrl = await this.locate(type, slug);
    if (!apiUrl) {
      return fail(new ToolError("locator_missing", `no api_url for ${type}/${slug}`));
    }

    let data: unknown;
    try {
      data = await this.transport.getJson(apiUrl);
    } catch (err) {
      if (err instanceof RetrievalError) {
        return fail(new ToolError("retrieval_failed", err.message));
      }
      throw err;
    }

    const detail: CachedDetail = { slug, api_url: apiUrl, data };
    await this.store.save(type, slug, detail);
    this.logger?.info({ type, slug, apiUrl }, "Detail fetched and cached");

    return ok(detail);
  }

  /** Indexed store first, then the flat file's exact match. */
  private async locate(type: ResourceType, slug: string): Promise<string | null> {
    const apiUrl = await this.catalog.getApiUrl(type, slug);
    if (apiUrl) return apiUrl;

    const entry = await this.flatFile.findBySlugOrName(type, slug);
    return entry?.apiUrl || null;
  }
}
