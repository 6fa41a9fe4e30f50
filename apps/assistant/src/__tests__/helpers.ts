// ---------------------------------------------------------------------------
// Test helpers: fixture catalog, in-memory store, fakes
// ---------------------------------------------------------------------------

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ChatMessage } from "@lorekeeper/shared";
import pino, { type Logger } from "pino";
import type { CatalogStore } from "../catalog/catalog-store.js";
import type { HttpTransport } from "../http/transport.js";
import type { ChatModel, LlmRawResponse } from "../llm/openai-client.js";

export const API = "https://catalog.test/v1";

// ---------------------------------------------------------------------------
// Fixture catalog
// ---------------------------------------------------------------------------

const MONSTERS = [
  { type: "monsters", name: "Goblin", slug_or_index: "goblin", api_url: `${API}/monsters/goblin/`, document_slug: "srd-2014", document_title: "SRD 5.1" },
  { type: "monsters", name: "Red Dragon, Young", slug_or_index: "young-red-dragon", api_url: `${API}/monsters/young-red-dragon/`, document_slug: "srd-2014", document_title: "SRD 5.1" },
  { type: "monsters", name: "Red Dragon, Young", slug_or_index: "young-red-dragon-a5e", api_url: `${API}/monsters/young-red-dragon-a5e/`, document_slug: "a5e", document_title: "Level Up" },
  { type: "monsters", name: "Zombie", slug_or_index: "zombie", api_url: `${API}/monsters/zombie/`, document_slug: "srd-2014", document_title: "SRD 5.1" },
  { type: "monsters", name: "Ogre Zombie", slug_or_index: "ogre-zombie", api_url: `${API}/monsters/ogre-zombie/`, document_slug: "srd-2014", document_title: "SRD 5.1" },
];

const MONSTER_INDEX = {
  Goblin: ["goblin"],
  "Young Red Dragon": [
    "young-red-dragon-stale",
    "young-red-dragon-a5e",
    "young-red-dragon",
  ],
  Zombie: ["zombie"],
  "Ogre Zombie": ["ogre-zombie"],
  "Zombie Lord": ["zombie-lord"],
  "Sneaky Skirmisher": ["goblin"],
};

const SPELLS = [
  { type: "spells", name: "Fireball", slug_or_index: "fireball", api_url: `${API}/spells/fireball/`, document_slug: "srd-2014", document_title: "SRD 5.1" },
  { type: "spells", name: "Wish", slug_or_index: "wish", api_url: null, document_slug: "srd-2014", document_title: "SRD 5.1" },
];

const EQUIPMENT = [
  { type: "armor", name: "Studded Leather Armor", slug_or_index: "studded-leather-armor", api_url: `${API}/armor/studded-leather-armor/`, document_slug: "srd-2014", document_title: "SRD 5.1" },
];

function jsonl(records: object[]): string {
  return records.map((r) => JSON.stringify(r)).join("\n") + "\n";
}

export interface Fixture {
  dataDir: string;
  cacheDir: string;
  logDir: string;
  cleanup(): Promise<void>;
}

/** Temp directory with a small catalog: data/, cache/, logs/. */
export async function createFixture(): Promise<Fixture> {
  const root = await mkdtemp(join(tmpdir(), "lorekeeper-"));
  const dataDir = join(root, "data");
  await mkdir(dataDir, { recursive: true });

  await writeFile(join(dataDir, "monsters.jsonl"), jsonl(MONSTERS));
  await writeFile(join(dataDir, "monsters.lookup.json"), JSON.stringify(MONSTER_INDEX));
  await writeFile(join(dataDir, "spells.jsonl"), jsonl(SPELLS));
  await writeFile(join(dataDir, "equipment.jsonl"), jsonl(EQUIPMENT));

  return {
    dataDir,
    cacheDir: join(root, "cache"),
    logDir: join(root, "logs"),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

/** In-process stand-in for the Postgres catalog store. */
export class MemoryCatalogStore implements CatalogStore {
  private rows = new Map<string, string | null>();
  lookups = 0;

  set(type: string, slug: string, apiUrl: string | null): this {
    this.rows.set(`${type}/${slug}`, apiUrl);
    return this;
  }

  async getApiUrl(type: string, slug: string): Promise<string | null> {
    this.lookups++;
    return this.rows.get(`${type}/${slug}`) ?? null;
  }
}

/** Returns canned bodies by URL and counts requests. */
export class CountingTransport implements HttpTransport {
  requests: string[] = [];

  constructor(
    private bodies: Record<string, unknown> = {},
    private failure?: Error,
  ) {}

  async getJson(url: string): Promise<unknown> {
    this.requests.push(url);
    if (this.failure) throw this.failure;
    return this.bodies[url] ?? { url };
  }
}

/** Replies with the scripted texts in order; the last one repeats. */
export class ScriptedModel implements ChatModel {
  received: ChatMessage[][] = [];

  constructor(private replies: string[]) {}

  async call(messages: ChatMessage[]): Promise<LlmRawResponse> {
    this.received.push(messages.map((m) => ({ ...m })));
    const index = Math.min(this.received.length - 1, this.replies.length - 1);
    return {
      text: this.replies[index] ?? "",
      usage: { promptTokens: 100, completionTokens: 20, totalTokens: 120 },
      model: "gpt-4o-mini",
      latencyMs: 5,
    };
  }
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/** Logger that keeps every record as parsed JSON. */
export function captureLogger(): { logger: Logger; records: Array<Record<string, unknown>> } {
  const records: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        records.push(JSON.parse(msg));
      },
    },
  );
  return { logger, records };
}
