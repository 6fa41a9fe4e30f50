// ---------------------------------------------------------------------------
// POST /ask: answer one catalog question
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { SessionResult } from "../agent/session.js";

// ---------------------------------------------------------------------------
// Request / Response schemas
// ---------------------------------------------------------------------------

export const AskRequestSchema = z.object({
  query: z.string().trim().min(1),
  max_steps: z.number().int().min(1).max(20).optional(),
});

export type AskRequest = z.infer<typeof AskRequestSchema>;

export const AskResponseSchema = z.object({
  answer: z.string(),
  status: z.enum(["final_answer", "budget_exhausted", "model_error"]),
  /** Absent for `model_error`: the failing step is not known. */
  steps: z.number().int().optional(),
  session_id: z.string().optional(),
});

export type AskResponse = z.infer<typeof AskResponseSchema>;

export const FALLBACK_ANSWER =
  "The assistant could not reach the language model. Please try again shortly.";

export type AskHandler = (
  query: string,
  options: { maxToolSteps?: number },
) => Promise<SessionResult>;

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export function registerAskRoute(app: FastifyInstance, ask: AskHandler) {
  app.post("/ask", async (request: FastifyRequest, reply: FastifyReply) => {
    const parseResult = AskRequestSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        error: "Invalid request",
        details: parseResult.error.issues,
      });
    }

    const req = parseResult.data;

    try {
      const result = await ask(req.query, { maxToolSteps: req.max_steps });
      const response: AskResponse = {
        answer: result.answer,
        status: result.status,
        steps: result.steps,
        session_id: result.sessionId,
      };
      return reply.status(200).send(response);
    } catch (err) {
      request.log.error({ err }, "Conversation failed; returning fallback");

      const response: AskResponse = {
        answer: FALLBACK_ANSWER,
        status: "model_error",
      };
      return reply.status(200).send(response);
    }
  });
}
