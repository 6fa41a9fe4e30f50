// ---------------------------------------------------------------------------
// Tool dispatcher: one parsed call in, one observation out
// ---------------------------------------------------------------------------

import {
  ToolCall,
  ToolName,
  type ObservationRecord,
} from "@lorekeeper/shared";
import type { Logger } from "pino";
import type { DetailCache } from "../cache/detail-cache.js";
import type { NameIndexStore } from "../catalog/name-index.js";
import type { Resolver } from "../catalog/resolver.js";
import {
  errorMessage,
  formatZodIssues,
  ok,
  type Result,
} from "../lib/errors.js";
import { extractCall } from "../parser/call-parser.js";

export interface ToolDispatcherDeps {
  resolver: Resolver;
  cache: DetailCache;
  nameIndex: NameIndexStore;
  logger: Logger;
}

/** What the conversation driver needs from a dispatcher. */
export interface CallHandler {
  parseAndDispatch(text: string): Promise<ObservationRecord | null>;
}

export class ToolDispatcher implements CallHandler {
  private resolver: Resolver;
  private cache: DetailCache;
  private nameIndex: NameIndexStore;
  private logger: Logger;

  constructor(deps: ToolDispatcherDeps) {
    this.resolver = deps.resolver;
    this.cache = deps.cache;
    this.nameIndex = deps.nameIndex;
    this.logger = deps.logger;
  }

  /**
   * Parse the first call block of `text` and run it.
   *
   * Returns `null` when there is no block *or* the block is malformed;
   * both count as "no tool call" for the conversation driver.
   */
  async parseAndDispatch(text: string): Promise<ObservationRecord | null> {
    const extraction = extractCall(text);

    switch (extraction.kind) {
      case "none":
        return null;
      case "malformed":
        this.logger.warn(
          { raw: extraction.raw, reason: extraction.reason },
          "CALL parse error",
        );
        return null;
      case "call":
        return this.dispatch(extraction.fn, extraction.args);
    }
  }

  /**
   * Route a call to its tool. Never rejects: unknown tools, invalid
   * arguments and tool failures all become the record's `error`.
   */
  async dispatch(
    fn: string,
    args: Record<string, unknown>,
  ): Promise<ObservationRecord> {
    if (!ToolName.safeParse(fn).success) {
      return { fn, args, error: `unknown tool: ${fn}` };
    }

    const call = ToolCall.safeParse({ fn, args });
    if (!call.success) {
      return {
        fn,
        args,
        error: `invalid arguments for ${fn}: ${formatZodIssues(call.error)}`,
      };
    }

    let outcome: Result<unknown>;
    try {
      outcome = await this.execute(call.data);
    } catch (err) {
      this.logger.error({ err, fn, args }, "Tool execution failed");
      return { fn, args, error: errorMessage(err) };
    }

    if (!outcome.ok) {
      this.logger.info(
        { fn, code: outcome.error.code, message: outcome.error.message },
        "Tool returned an error",
      );
      return { fn, args, error: outcome.error.message };
    }
    return { fn, args, result: outcome.value };
  }

  // -------------------------------------------------------------------------
  // Individual tools
  // -------------------------------------------------------------------------

  private async execute(call: ToolCall): Promise<Result<unknown>> {
    switch (call.fn) {
      case "look_monster_table":
        return ok({
          matches: await this.nameIndex.search(
            "monsters",
            call.args.query,
            call.args.limit,
          ),
        });
      case "look_table":
        return ok({
          matches: await this.nameIndex.search(
            call.args.type,
            call.args.query,
            call.args.limit,
          ),
        });
      case "search_table":
        return this.resolver.resolve(
          call.args.type,
          call.args.name_or_slug,
          call.args.prefer_doc,
        );
      case "fetch_and_cache":
        return this.cache.fetchDetail(call.args.type, call.args.slug);
    }
  }
}
