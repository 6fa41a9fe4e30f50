// ---------------------------------------------------------------------------
// Conversation driver: model turns, tool observations, step budget
// ---------------------------------------------------------------------------

import type {
  ChatMessage,
  ConversationStatus,
  ObservationRecord,
} from "@lorekeeper/shared";
import type { Logger } from "pino";
import type { ChatModel } from "../llm/openai-client.js";
import { logUsage } from "../logger/usage-logger.js";
import {
  buildMessages,
  buildObservationMessage,
  truncateForLog,
} from "../prompts/context-builder.js";
import {
  ANSWER_NOW_INSTRUCTION,
  BUDGET_EXHAUSTED_MESSAGE,
  buildSystemPrompt,
  FORCE_TOOL_REMINDER,
} from "../prompts/system-prompt.js";
import type { CallHandler } from "../tools/dispatcher.js";

export const DEFAULT_MAX_TOOL_STEPS = 6;

export interface ConversationState {
  messages: ChatMessage[];
  stepsTaken: number;
  /** Set once a fetch_and_cache call has succeeded; never cleared. */
  hasFetchedDetailOnce: boolean;
  /** Set on the final answer; further steps do not call the model. */
  done: boolean;
  finalAnswer: string | null;
}

export type StepOutcome =
  | { kind: "forced_retry"; reply: string }
  | { kind: "observed"; observation: ObservationRecord }
  | { kind: "final_answer"; answer: string };

export interface ConversationResult {
  status: ConversationStatus;
  answer: string;
  steps: number;
  messages: ChatMessage[];
}

export interface ConversationDeps {
  model: ChatModel;
  dispatcher: CallHandler;
  logger: Logger;
  sessionId?: string;
}

export interface ConversationOptions {
  maxToolSteps?: number;
  systemPrompt?: string;
}

function isSuccessfulFetch(observation: ObservationRecord): boolean {
  return observation.fn === "fetch_and_cache" && observation.error === undefined;
}

export class ConversationDriver {
  private model: ChatModel;
  private dispatcher: CallHandler;
  private logger: Logger;
  private sessionId: string;
  private maxToolSteps: number;
  private systemPrompt: string;

  constructor(deps: ConversationDeps, options: ConversationOptions = {}) {
    this.model = deps.model;
    this.dispatcher = deps.dispatcher;
    this.logger = deps.logger;
    this.sessionId = deps.sessionId ?? "anonymous";
    this.maxToolSteps = options.maxToolSteps ?? DEFAULT_MAX_TOOL_STEPS;
    this.systemPrompt = options.systemPrompt ?? buildSystemPrompt();
  }

  start(query: string): ConversationState {
    return {
      messages: buildMessages(query, this.systemPrompt),
      stepsTaken: 0,
      hasFetchedDetailOnce: false,
      done: false,
      finalAnswer: null,
    };
  }

  /**
   * One model invocation plus whatever it triggers. Mutates `state`.
   * A finished conversation returns its final answer again.
   */
  async step(state: ConversationState): Promise<StepOutcome> {
    if (state.done) {
      return { kind: "final_answer", answer: state.finalAnswer ?? "" };
    }

    const stepNo = state.stepsTaken + 1;
    this.logger.info(
      {
        step: stepNo,
        recent: state.messages.slice(-3).map((m) => ({
          role: m.role,
          content: truncateForLog(m.content),
        })),
      },
      "Step context",
    );

    const response = await this.model.call(state.messages);
    state.stepsTaken = stepNo;
    const reply = response.text;
    state.messages.push({ role: "assistant", content: reply });
    this.logger.info({ step: stepNo, output: reply }, "Model output");

    const observation = await this.dispatcher.parseAndDispatch(reply);

    logUsage(this.logger, {
      sessionId: this.sessionId,
      step: stepNo,
      model: response.model,
      promptTokens: response.usage.promptTokens,
      completionTokens: response.usage.completionTokens,
      totalTokens: response.usage.totalTokens,
      latencyMs: response.latencyMs,
      toolName: observation?.fn ?? null,
    });

    if (!observation) {
      if (!state.hasFetchedDetailOnce) {
        this.logger.info({ step: stepNo }, "No tool call before fetch; forcing retry");
        state.messages.push({ role: "system", content: FORCE_TOOL_REMINDER });
        return { kind: "forced_retry", reply };
      }
      state.done = true;
      state.finalAnswer = reply;
      this.logger.info({ step: stepNo, answer: reply }, "Final answer");
      return { kind: "final_answer", answer: reply };
    }

    this.logger.info(
      { step: stepNo, fn: observation.fn, args: observation.args },
      "Tool call",
    );

    if (isSuccessfulFetch(observation)) {
      state.hasFetchedDetailOnce = true;
      state.messages.push({ role: "system", content: ANSWER_NOW_INSTRUCTION });
    }

    const message = buildObservationMessage(observation);
    state.messages.push(message);
    this.logger.info(
      { step: stepNo, observation: truncateForLog(message.content) },
      "Observation",
    );

    return { kind: "observed", observation };
  }

  /**
   * Drive the conversation until a final answer or until the step budget
   * runs out. Rejects only when the model call itself fails.
   */
  async run(query: string): Promise<ConversationResult> {
    this.logger.info({ query, maxToolSteps: this.maxToolSteps }, "User query");
    const state = this.start(query);

    while (!state.done && state.stepsTaken < this.maxToolSteps) {
      const outcome = await this.step(state);
      if (outcome.kind === "final_answer") {
        return {
          status: "final_answer",
          answer: outcome.answer,
          steps: state.stepsTaken,
          messages: state.messages,
        };
      }
    }

    this.logger.warn({ steps: state.stepsTaken }, "Tool call limit reached");
    return {
      status: "budget_exhausted",
      answer: BUDGET_EXHAUSTED_MESSAGE,
      steps: state.stepsTaken,
      messages: state.messages,
    };
  }

  async answerQuery(query: string): Promise<string> {
    const result = await this.run(query);
    return result.answer;
  }
}
