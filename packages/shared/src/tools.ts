import { z } from "zod";
import { ResourceType } from "./enums.js";

// ---------------------------------------------------------------------------
// Raw payload inside a <CALL>…</CALL> block
// ---------------------------------------------------------------------------

/** `{"fn": "<tool>", "args": {...}}`; `args` may be omitted. */
export const CallPayload = z.object({
  fn: z.string().min(1),
  args: z.record(z.unknown()).default({}),
});
export type CallPayload = z.infer<typeof CallPayload>;

/** Result cap for the coarse name searches. Numeric strings are accepted. */
const Limit = z.coerce.number().int().positive().default(20);

// ---------------------------------------------------------------------------
// 1. look_monster_table
// ---------------------------------------------------------------------------
export const LookMonsterTableArgs = z.object({
  query: z.string().default(""),
  limit: Limit,
});
export type LookMonsterTableArgs = z.infer<typeof LookMonsterTableArgs>;

// ---------------------------------------------------------------------------
// 2. look_table
// ---------------------------------------------------------------------------
export const LookTableArgs = z.object({
  type: ResourceType.default("monsters"),
  query: z.string().default(""),
  limit: Limit,
});
export type LookTableArgs = z.infer<typeof LookTableArgs>;

// ---------------------------------------------------------------------------
// 3. search_table
// ---------------------------------------------------------------------------
export const SearchTableArgs = z.object({
  type: ResourceType.default("monsters"),
  name_or_slug: z.string().min(1),
  prefer_doc: z.string().nullable().default(null),
});
export type SearchTableArgs = z.infer<typeof SearchTableArgs>;

// ---------------------------------------------------------------------------
// 4. fetch_and_cache
// ---------------------------------------------------------------------------
export const FetchAndCacheArgs = z.object({
  type: ResourceType.default("monsters"),
  slug: z.string().min(1),
});
export type FetchAndCacheArgs = z.infer<typeof FetchAndCacheArgs>;

// ---------------------------------------------------------------------------
// Discriminated tool-call union
// ---------------------------------------------------------------------------
export const ToolCall = z.discriminatedUnion("fn", [
  z.object({ fn: z.literal("look_monster_table"), args: LookMonsterTableArgs }),
  z.object({ fn: z.literal("look_table"), args: LookTableArgs }),
  z.object({ fn: z.literal("search_table"), args: SearchTableArgs }),
  z.object({ fn: z.literal("fetch_and_cache"), args: FetchAndCacheArgs }),
]);
export type ToolCall = z.infer<typeof ToolCall>;

// ---------------------------------------------------------------------------
// Observation fed back to the model after a dispatched call
// ---------------------------------------------------------------------------

interface ObservationBase {
  fn: string;
  args: Record<string, unknown>;
}

/** Exactly one of `result` / `error` is present. */
export type ObservationRecord =
  | (ObservationBase & { result: unknown; error?: never })
  | (ObservationBase & { error: string; result?: never });
