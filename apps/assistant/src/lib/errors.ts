// ---------------------------------------------------------------------------
// Tool error taxonomy + result type
// ---------------------------------------------------------------------------

import type { ZodError } from "zod";

export type ToolErrorCode =
  | "not_found"
  | "locator_missing"
  | "retrieval_failed"
  | "cache_corrupt"
  | "invalid_arguments"
  | "unknown_tool";

/**
 * A tool failure that is reported back to the model as an observation
 * error instead of aborting the conversation.
 */
export class ToolError extends Error {
  constructor(
    public code: ToolErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ToolError";
  }
}

/** Transport-level failure: network error, timeout or non-2xx response. */
export class RetrievalError extends Error {
  public status: number | undefined;
  public retryable: boolean;

  constructor(
    public url: string,
    message: string,
    options: { status?: number; retryable?: boolean } = {},
  ) {
    super(message);
    this.name = "RetrievalError";
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

export type Result<T, E = ToolError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "unknown error";
}

/** `path: message` pairs joined with "; ". */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
