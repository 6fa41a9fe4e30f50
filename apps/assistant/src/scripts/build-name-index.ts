import "dotenv/config";
import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import {
  catalogFilePath,
  nameIndexFilePath,
  readCatalogRecords,
} from "@lorekeeper/db";
import { ResourceType } from "@lorekeeper/shared";
import { buildNameIndex } from "../catalog/name-index.js";

const DATA_DIR = process.env.CATALOG_DATA_DIR ?? "./data";

/**
 * Regenerate `<type>.lookup.json` for every `<type>.jsonl` in the data
 * directory. Pass type names as arguments to limit the run.
 */
async function main() {
  const requested = process.argv.slice(2);
  const types = requested.length
    ? requested.map((t) => ResourceType.parse(t))
    : ResourceType.options;

  for (const type of types) {
    if (!existsSync(catalogFilePath(DATA_DIR, type))) continue;

    const index = await buildNameIndex(
      readCatalogRecords(catalogFilePath(DATA_DIR, type)),
    );
    const path = nameIndexFilePath(DATA_DIR, type);
    await writeFile(path, JSON.stringify(index, null, 2), "utf-8");
    console.log(`  ${type.padEnd(12)} ${String(Object.keys(index).length).padStart(6)} names -> ${path}`);
  }
}

main().catch((err) => {
  console.error("Name index build failed:", err);
  process.exit(1);
});
