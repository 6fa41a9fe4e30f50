// ---------------------------------------------------------------------------
// System prompt + the driver's fixed system messages
// ---------------------------------------------------------------------------

import { ResourceType } from "@lorekeeper/shared";
import { TOOL_DEFINITIONS } from "../llm/tool-definitions.js";
import { renderCall } from "../parser/call-parser.js";

interface PromptExample {
  heading: string;
  user: string;
  calls: Array<{ fn: string; args: Record<string, unknown> }>;
}

const EXAMPLES: PromptExample[] = [
  {
    heading: "MONSTERS",
    user: "What can a Zombie do?",
    calls: [
      { fn: "look_monster_table", args: { query: "Zombie", limit: 10 } },
      {
        fn: "search_table",
        args: { type: "monsters", name_or_slug: "Zombie", prefer_doc: "srd-2014" },
      },
      { fn: "fetch_and_cache", args: { type: "monsters", slug: "zombie" } },
    ],
  },
  {
    heading: "SPELLS",
    user: "How does Fireball work?",
    calls: [
      {
        fn: "search_table",
        args: { type: "spells", name_or_slug: "Fireball", prefer_doc: "srd-2014" },
      },
      { fn: "fetch_and_cache", args: { type: "spells", slug: "fireball" } },
    ],
  },
  {
    heading: "EQUIPMENT",
    user: "What AC does Studded Leather Armor give?",
    calls: [
      {
        fn: "search_table",
        args: {
          type: "equipment",
          name_or_slug: "Studded Leather Armor",
          prefer_doc: "srd-2014",
        },
      },
      {
        fn: "fetch_and_cache",
        args: { type: "equipment", slug: "studded-leather-armor" },
      },
    ],
  },
  {
    heading: "CONDITIONS",
    user: "What happens to a grappled creature?",
    calls: [
      {
        fn: "search_table",
        args: { type: "conditions", name_or_slug: "Grappled", prefer_doc: null },
      },
    ],
  },
  {
    heading: "SECTIONS (RULEBOOK CHAPTERS)",
    user: "Explain two-weapon fighting.",
    calls: [
      {
        fn: "search_table",
        args: { type: "sections", name_or_slug: "Two-Weapon Fighting" },
      },
    ],
  },
];

function renderExample(example: PromptExample): string {
  const lines = [`### ${example.heading}`, `User: ${example.user}`];
  example.calls.forEach((call, i) => {
    if (i > 0) lines.push("System: Observation: {...}");
    lines.push(`Assistant: ${renderCall(call.fn, call.args)}`);
  });
  return lines.join("\n");
}

/**
 * Build the system prompt: call protocol, tool list, resource types and
 * one worked exchange per common category.
 */
export function buildSystemPrompt(): string {
  const tools = TOOL_DEFINITIONS.map(
    (t) => `- ${t.signature}\n    ${t.description}`,
  ).join("\n");

  return `You are a rules-reference assistant for a fantasy tabletop RPG. Every answer must be grounded in the local catalog, which you reach only through tools.

CALL PROTOCOL:
- To use a tool, reply with exactly one block and nothing else:
  <CALL>{"fn":"function_name","args":{...}}</CALL>
- Do not describe what you are about to do; just emit the block.
- The system runs the tool and replies with a system message starting with "Observation: " followed by JSON.
- You may call several tools in turn. Only after a successful fetch_and_cache may you write the final answer.
- Never include <CALL> in a final answer.

AVAILABLE FUNCTIONS:
${tools}

RESOURCE TYPES (for look_table, search_table and fetch_and_cache):
  ${ResourceType.options.join(", ")}

EXAMPLES:

${EXAMPLES.map(renderExample).join("\n\n")}

Follow this exact format.`;
}

/** Appended when the model answers before any successful fetch. */
export const FORCE_TOOL_REMINDER =
  'Reminder: You MUST call a tool next. Output exactly one block like <CALL>{"fn":"...","args":{...}}</CALL>. Do NOT give a final answer yet.';

/** Appended right after the first successful fetch_and_cache. */
export const ANSWER_NOW_INSTRUCTION =
  "You have just received the full JSON data from fetch_and_cache. Now you MUST answer the user's question in natural language, using that data. Do NOT call any tools again, and do NOT output any <CALL> blocks in your next message.";

/** Returned to the caller when the step budget runs out. */
export const BUDGET_EXHAUSTED_MESSAGE =
  "Tool call limit reached. Please provide a final answer based on the observations so far.";
