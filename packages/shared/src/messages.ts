import { z } from "zod";
import { MessageRole } from "./enums.js";

// ---------------------------------------------------------------------------
// Chat messages exchanged with the model
// ---------------------------------------------------------------------------
export const ChatMessage = z.object({
  role: MessageRole,
  content: z.string(),
});
export type ChatMessage = z.infer<typeof ChatMessage>;

/** Prefix of every observation message fed back to the model. */
export const OBSERVATION_PREFIX = "Observation: ";
