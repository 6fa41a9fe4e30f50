// ---------------------------------------------------------------------------
// Call parser: locate the first <CALL>…</CALL> block in model text
// ---------------------------------------------------------------------------

import { CallPayload } from "@lorekeeper/shared";
import { errorMessage, formatZodIssues } from "../lib/errors.js";

const CALL_RE = /<CALL>([\s\S]+?)<\/CALL>/i;

export type CallExtraction =
  /** No call block: the text is a candidate final answer. */
  | { kind: "none" }
  /** A block whose payload is not `{"fn": string, "args"?: object}`. */
  | { kind: "malformed"; raw: string; reason: string }
  | { kind: "call"; fn: string; args: Record<string, unknown> };

/**
 * Extract the first call block. Anything after it is ignored, so at most
 * one call is recognized per assistant turn.
 */
export function extractCall(text: string): CallExtraction {
  const match = CALL_RE.exec(text);
  if (!match) return { kind: "none" };

  const raw = match[1];

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { kind: "malformed", raw, reason: `invalid JSON: ${errorMessage(err)}` };
  }

  const payload = CallPayload.safeParse(json);
  if (!payload.success) {
    return { kind: "malformed", raw, reason: formatZodIssues(payload.error) };
  }

  return { kind: "call", fn: payload.data.fn, args: payload.data.args };
}

/** Render a call block the way the model is asked to write one. */
export function renderCall(fn: string, args: Record<string, unknown>): string {
  return `<CALL>${JSON.stringify({ fn, args })}</CALL>`;
}
