// ---------------------------------------------------------------------------
// @lorekeeper/assistant: Fastify server entry point
// ---------------------------------------------------------------------------

import "dotenv/config";
import { sql } from "drizzle-orm";
import pino from "pino";
import type pg from "pg";
import { createDb } from "@lorekeeper/db";
import { runConversation, type AssistantRuntime } from "./agent/session.js";
import { buildApp } from "./app.js";
import { DetailCache, FileDetailStore } from "./cache/detail-cache.js";
import {
  NullCatalogStore,
  PgCatalogStore,
  type CatalogStore,
} from "./catalog/catalog-store.js";
import { FlatFileCatalog } from "./catalog/flat-file.js";
import { NameIndexStore } from "./catalog/name-index.js";
import { Resolver } from "./catalog/resolver.js";
import { loadConfig } from "./config.js";
import { FetchTransport } from "./http/transport.js";
import { LlmClient } from "./llm/openai-client.js";

async function main() {
  const config = loadConfig();
  const logger = pino({ level: config.logLevel });

  // ---------------------------------------------------------------------------
  // Indexed catalog store (optional; resolution falls back to flat files)
  // ---------------------------------------------------------------------------
  let pool: pg.Pool | null = null;
  let store: CatalogStore = new NullCatalogStore();
  if (config.databaseUrl) {
    const conn = createDb(config.databaseUrl);
    try {
      // Quick connectivity check
      await conn.db.execute(sql`SELECT 1`);
      pool = conn.pool;
      store = new PgCatalogStore(conn.db);
      logger.info("Connected to PostgreSQL catalog store");
    } catch (err) {
      logger.warn({ err }, "PostgreSQL not available; using flat files only");
      await conn.pool.end();
    }
  }

  // ---------------------------------------------------------------------------
  // Catalog + cache
  // ---------------------------------------------------------------------------
  const flatFile = new FlatFileCatalog(config.dataDir);
  const nameIndex = new NameIndexStore(config.dataDir);
  const resolver = new Resolver({ store, flatFile, nameIndex, logger });
  const cache = new DetailCache({
    store: new FileDetailStore(config.cacheDir),
    catalog: store,
    flatFile,
    transport: new FetchTransport({
      timeoutMs: config.fetchTimeoutMs,
      retries: config.fetchRetries,
      backoffMs: config.fetchBackoffMs,
      logger,
    }),
    logger,
  });

  // ---------------------------------------------------------------------------
  // LLM client
  // ---------------------------------------------------------------------------
  if (!config.openaiApiKey) {
    logger.warn("OPENAI_API_KEY not set; model calls will fail.");
  }

  const runtime: AssistantRuntime = {
    model: new LlmClient(config.openaiApiKey, config.model, config.temperature),
    resolver,
    cache,
    nameIndex,
    logDir: config.logDir,
    logLevel: config.logLevel,
    maxToolSteps: config.maxToolSteps,
  };

  const app = await buildApp({
    ask: (query, options) => runConversation(runtime, query, options),
    logLevel: config.logLevel,
  });

  // ---------------------------------------------------------------------------
  // Start
  // ---------------------------------------------------------------------------
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Assistant listening on ${config.host}:${config.port}`);
  } catch (err) {
    app.log.fatal(err);
    process.exit(1);
  }

  // ---------------------------------------------------------------------------
  // Graceful shutdown
  // ---------------------------------------------------------------------------
  const shutdown = async () => {
    app.log.info("Shutting down...");
    await app.close();
    if (pool) {
      await pool.end();
    }
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main();
