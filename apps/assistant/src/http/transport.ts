// ---------------------------------------------------------------------------
// Outbound HTTP: bounded timeout + exponential backoff for every GET
// ---------------------------------------------------------------------------

import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import { errorMessage, RetrievalError } from "../lib/errors.js";

/** Statuses worth another attempt (rate limiting, transient upstream failure). */
const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === "TimeoutError";
}

export interface HttpTransport {
  /** GET `url` and decode the body as JSON. Rejects with {@link RetrievalError}. */
  getJson(url: string): Promise<unknown>;
}

export interface FetchTransportOptions {
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

export class FetchTransport implements HttpTransport {
  private timeoutMs: number;
  private retries: number;
  private backoffMs: number;
  private logger: Logger | undefined;
  private fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retries = options.retries ?? 3;
    this.backoffMs = options.backoffMs ?? 700;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getJson(url: string): Promise<unknown> {
    let attempt = 0;

    while (true) {
      try {
        return await this.attempt(url);
      } catch (err) {
        const retryable = err instanceof RetrievalError && err.retryable;
        if (!retryable || attempt >= this.retries) {
          throw err;
        }

        const delayMs = this.backoffMs * Math.pow(2, attempt);
        this.logger?.warn(
          { url, attempt: attempt + 1, delayMs, reason: errorMessage(err) },
          "Retrying catalog GET",
        );
        await sleep(delayMs);
        attempt++;
      }
    }
  }

  private async attempt(url: string): Promise<unknown> {
    this.logger?.debug({ url }, "HTTP GET");

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (isTimeout(err)) {
        throw this.timedOut(url);
      }
      throw new RetrievalError(url, `GET ${url} failed: ${errorMessage(err)}`, {
        retryable: true,
      });
    }

    if (!res.ok) {
      throw new RetrievalError(url, `GET ${url} returned ${res.status}`, {
        status: res.status,
        retryable: RETRYABLE_STATUS.has(res.status),
      });
    }

    try {
      return await res.json();
    } catch (err) {
      // The timeout signal also covers reading the body.
      if (isTimeout(err)) {
        throw this.timedOut(url);
      }
      throw new RetrievalError(
        url,
        `GET ${url} returned a body that is not JSON: ${errorMessage(err)}`,
        { status: res.status },
      );
    }
  }

  private timedOut(url: string): RetrievalError {
    return new RetrievalError(url, `GET ${url} timed out after ${this.timeoutMs}ms`);
  }
}
