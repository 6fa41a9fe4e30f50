// ---------------------------------------------------------------------------
// OpenAI LLM client: plain text completions (tool calls live in the text)
// ---------------------------------------------------------------------------

import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ChatMessage } from "@lorekeeper/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LlmRawResponse {
  text: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  model: string;
  latencyMs: number;
}

/** The model boundary: full message history in, one text reply out. */
export interface ChatModel {
  call(messages: ChatMessage[]): Promise<LlmRawResponse>;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class LlmClient implements ChatModel {
  private openai: OpenAI;
  private model: string;
  private temperature: number;

  constructor(apiKey: string, model: string, temperature = 0.2) {
    this.openai = new OpenAI({ apiKey });
    this.model = model;
    this.temperature = temperature;
  }

  /**
   * Send the conversation so far and return the assistant's text with
   * usage stats. No streaming, no native tool calling.
   */
  async call(messages: ChatMessage[]): Promise<LlmRawResponse> {
    const startMs = Date.now();

    const openaiMessages: ChatCompletionMessageParam[] = messages.map((m) => ({
      role: m.role,
      content: m.content,
    }));

    const completion = await this.openai.chat.completions.create({
      model: this.model,
      messages: openaiMessages,
      temperature: this.temperature,
    });

    const latencyMs = Date.now() - startMs;
    const message = completion.choices[0]?.message;

    const usage = {
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
      totalTokens: completion.usage?.total_tokens ?? 0,
    };

    return {
      text: message?.content ?? "",
      usage,
      model: completion.model,
      latencyMs,
    };
  }
}
