// ---------------------------------------------------------------------------
// Message assembly: initial history + observation messages
// ---------------------------------------------------------------------------

import {
  OBSERVATION_PREFIX,
  type ChatMessage,
  type ObservationRecord,
} from "@lorekeeper/shared";
import { buildSystemPrompt } from "./system-prompt.js";

/**
 * Initial message list of a conversation:
 *   [0] system: role, call protocol, tools, examples
 *   [1] user:   the query, verbatim
 */
export function buildMessages(
  userQuery: string,
  systemPrompt: string = buildSystemPrompt(),
): ChatMessage[] {
  return [
    { role: "system", content: systemPrompt },
    { role: "user", content: userQuery },
  ];
}

/** `Observation: ` followed by the record as indented JSON. */
export function formatObservation(record: ObservationRecord): string {
  return `${OBSERVATION_PREFIX}${JSON.stringify(record, null, 2)}`;
}

export function buildObservationMessage(record: ObservationRecord): ChatMessage {
  return { role: "system", content: formatObservation(record) };
}

/** Shorten long message bodies for the session transcript. */
export function truncateForLog(content: string, max = 1000): string {
  return content.length > max ? `${content.slice(0, max)}...` : content;
}
