// ---------------------------------------------------------------------------
// Per-conversation transcript files
// ---------------------------------------------------------------------------

import { randomBytes } from "node:crypto";
import { join } from "node:path";
import pino, { type Logger } from "pino";

export interface SessionLog {
  id: string;
  path: string;
  logger: Logger;
  /** Flush and close the file. */
  close(): void;
}

export interface SessionLogOptions {
  logDir: string;
  level?: string;
  now?: Date;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatSessionTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Open `<logDir>/session_<timestamp>_<suffix>.log`. The random suffix
 * keeps two conversations started in the same second apart.
 */
export function createSessionLog(options: SessionLogOptions): SessionLog {
  const id = `${formatSessionTimestamp(options.now ?? new Date())}_${randomBytes(3).toString("hex")}`;
  const path = join(options.logDir, `session_${id}.log`);

  const destination = pino.destination({ dest: path, mkdir: true, sync: true });
  const logger = pino(
    { level: options.level ?? "info", base: { sessionId: id } },
    destination,
  );

  return {
    id,
    path,
    logger,
    close: () => destination.end(),
  };
}
