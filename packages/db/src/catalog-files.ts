// ---------------------------------------------------------------------------
// Flat catalog files produced by the offline builder
// ---------------------------------------------------------------------------

import { createReadStream, existsSync } from "node:fs";
import { join } from "node:path";
import { createInterface } from "node:readline";
import { CatalogRecord } from "@lorekeeper/shared";

/** `<dataDir>/<type>.jsonl`: one CatalogRecord per line. */
export function catalogFilePath(dataDir: string, type: string): string {
  return join(dataDir, `${type}.jsonl`);
}

/** `<dataDir>/<type>.lookup.json`: display name -> candidate slugs. */
export function nameIndexFilePath(dataDir: string, type: string): string {
  return join(dataDir, `${type}.lookup.json`);
}

/**
 * Parse one JSONL line. Blank lines, invalid JSON and records without a
 * slug yield `null`; the builder output is best-effort.
 */
export function parseCatalogLine(line: string): CatalogRecord | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const result = CatalogRecord.safeParse(json);
  return result.success ? result.data : null;
}

/**
 * Stream the records of a catalog file in file order.
 * A missing file yields nothing. Breaking out of the loop closes the file.
 */
export async function* readCatalogRecords(
  path: string,
): AsyncGenerator<CatalogRecord> {
  if (!existsSync(path)) return;

  const stream = createReadStream(path, { encoding: "utf-8" });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      const record = parseCatalogLine(line);
      if (record) yield record;
    }
  } finally {
    lines.close();
    stream.destroy();
  }
}
