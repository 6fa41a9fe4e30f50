// ---------------------------------------------------------------------------
// One query = one session transcript + one conversation
// ---------------------------------------------------------------------------

import type { DetailCache } from "../cache/detail-cache.js";
import type { NameIndexStore } from "../catalog/name-index.js";
import type { Resolver } from "../catalog/resolver.js";
import type { ChatModel } from "../llm/openai-client.js";
import { createSessionLog } from "../logger/session-log.js";
import { ToolDispatcher } from "../tools/dispatcher.js";
import { ConversationDriver, type ConversationResult } from "./conversation.js";

/** Long-lived collaborators shared by every conversation. */
export interface AssistantRuntime {
  model: ChatModel;
  resolver: Resolver;
  cache: DetailCache;
  nameIndex: NameIndexStore;
  logDir: string;
  logLevel: string;
  maxToolSteps: number;
}

export interface SessionResult extends ConversationResult {
  sessionId: string;
}

export async function runConversation(
  runtime: AssistantRuntime,
  query: string,
  options: { maxToolSteps?: number } = {},
): Promise<SessionResult> {
  const session = createSessionLog({
    logDir: runtime.logDir,
    level: runtime.logLevel,
  });

  try {
    const dispatcher = new ToolDispatcher({
      resolver: runtime.resolver,
      cache: runtime.cache,
      nameIndex: runtime.nameIndex,
      logger: session.logger,
    });
    const driver = new ConversationDriver(
      {
        model: runtime.model,
        dispatcher,
        logger: session.logger,
        sessionId: session.id,
      },
      { maxToolSteps: options.maxToolSteps ?? runtime.maxToolSteps },
    );

    const result = await driver.run(query);
    return { ...result, sessionId: session.id };
  } catch (err) {
    session.logger.error({ err }, "Conversation failed");
    throw err;
  } finally {
    session.close();
  }
}
