// ---------------------------------------------------------------------------
// Tool definitions: what the system prompt advertises to the model
// ---------------------------------------------------------------------------

import type { ToolName } from "@lorekeeper/shared";

export interface ToolDefinition {
  name: ToolName;
  /** Signature shown in the prompt */
  signature: string;
  description: string;
}

/**
 * The 4 catalog tools. The model calls them by writing a
 * `<CALL>{"fn": ..., "args": {...}}</CALL>` block; the dispatcher
 * validates the arguments against the shared zod schemas.
 */
export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "look_monster_table",
    signature: "look_monster_table(query: string, limit: number = 20)",
    description:
      "Substring search over monster display names. Returns {matches: [{name, slugs}]}. Use it when the user's monster name may be partial or misspelled.",
  },
  {
    name: "look_table",
    signature: "look_table(type: string, query: string, limit: number = 20)",
    description:
      "Same substring search for any resource type that has a name index (monsters, equipment, spells).",
  },
  {
    name: "search_table",
    signature: "search_table(type: string, name_or_slug: string, prefer_doc: string | null)",
    description:
      "Resolve one entry by slug or exact name. Returns {chosen_name, chosen_slug, api_url}. prefer_doc (e.g. \"srd-2014\") picks that document when a name exists in several.",
  },
  {
    name: "fetch_and_cache",
    signature: "fetch_and_cache(type: string, slug: string)",
    description:
      "Fetch the full detail record of a resolved slug. Returns {slug, api_url, data}. You must call this before answering.",
  },
];
