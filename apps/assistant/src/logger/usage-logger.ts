// ---------------------------------------------------------------------------
// Token/cost usage logger
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

// ---------------------------------------------------------------------------
// Pricing table (per 1M tokens, USD)
// ---------------------------------------------------------------------------

const PRICING: Record<string, { input: number; output: number }> = {
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "gpt-4o": { input: 2.5, output: 10.0 },
  "gpt-4o-2024-11-20": { input: 2.5, output: 10.0 },
  "gpt-4.1-mini": { input: 0.4, output: 1.6 },
  "gpt-4.1": { input: 2.0, output: 8.0 },
};

const DEFAULT_PRICING = { input: 1.0, output: 3.0 }; // conservative fallback

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface UsageEntry {
  sessionId: string;
  step: number;
  model: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  estimatedCostUsd: number;
  latencyMs: number;
  /** Tool the reply asked for, or `null` for a plain-text reply */
  toolName: string | null;
  timestamp: string;
}

// ---------------------------------------------------------------------------
// Cost estimation
// ---------------------------------------------------------------------------

export function estimateCost(
  model: string,
  promptTokens: number,
  completionTokens: number,
): number {
  const pricing = PRICING[model] ?? DEFAULT_PRICING;
  const inputCost = (promptTokens / 1_000_000) * pricing.input;
  const outputCost = (completionTokens / 1_000_000) * pricing.output;
  return Math.round((inputCost + outputCost) * 10000) / 10000; // 4 decimal places
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

/** Log token usage and estimated cost of one model call. */
export function logUsage(
  logger: Logger,
  params: {
    sessionId: string;
    step: number;
    model: string;
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
    latencyMs: number;
    toolName: string | null;
  },
): UsageEntry {
  const entry: UsageEntry = {
    ...params,
    estimatedCostUsd: estimateCost(
      params.model,
      params.promptTokens,
      params.completionTokens,
    ),
    timestamp: new Date().toISOString(),
  };

  logger.info({ usage: entry }, "llm_usage");

  return entry;
}
