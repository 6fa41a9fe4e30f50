// ---------------------------------------------------------------------------
// Fastify app factory: used by both production entry point and tests
// ---------------------------------------------------------------------------

import Fastify, { type FastifyInstance } from "fastify";
import { registerAskRoute, type AskHandler } from "./routes/ask.js";

export interface BuildAppOptions {
  ask: AskHandler;
  /** Request log level; request logging is off when omitted (tests) */
  logLevel?: string;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logLevel ? { level: options.logLevel } : false,
  });

  registerAskRoute(app, options.ask);

  // Health check
  app.get("/health", async () => ({
    status: "ok",
    service: "assistant",
  }));

  return app;
}
