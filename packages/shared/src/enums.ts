import { z } from "zod";

// ---------------------------------------------------------------------------
// Reference catalog resource types (one flat file per type)
// ---------------------------------------------------------------------------
export const ResourceType = z.enum([
  "monsters",
  "spells",
  "equipment",
  "backgrounds",
  "classes",
  "conditions",
  "documents",
  "feats",
  "planes",
  "races",
  "sections",
  "spelllist",
]);
export type ResourceType = z.infer<typeof ResourceType>;

// ---------------------------------------------------------------------------
// Canonical tool names (4)
// ---------------------------------------------------------------------------
export const ToolName = z.enum([
  "look_monster_table",
  "look_table",
  "search_table",
  "fetch_and_cache",
]);
export type ToolName = z.infer<typeof ToolName>;

// ---------------------------------------------------------------------------
// Chat message roles
// ---------------------------------------------------------------------------
export const MessageRole = z.enum(["system", "user", "assistant"]);
export type MessageRole = z.infer<typeof MessageRole>;

// ---------------------------------------------------------------------------
// Terminal states of one conversation
// ---------------------------------------------------------------------------
export const ConversationStatus = z.enum(["final_answer", "budget_exhausted"]);
export type ConversationStatus = z.infer<typeof ConversationStatus>;
