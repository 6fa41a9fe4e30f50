import { describe, expect, it } from "vitest";
import {
  ConversationStatus,
  MessageRole,
  ResourceType,
  ToolName,
} from "../enums.js";

describe("ResourceType", () => {
  it.each([
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
  ])('accepts "%s"', (val) => {
    expect(ResourceType.parse(val)).toBe(val);
  });

  it("has exactly 12 types", () => {
    expect(ResourceType.options).toHaveLength(12);
  });

  it("rejects singular or upstream sub-collection names", () => {
    expect(() => ResourceType.parse("monster")).toThrow();
    expect(() => ResourceType.parse("magicitems")).toThrow();
  });
});

describe("ToolName", () => {
  it.each(["look_monster_table", "look_table", "search_table", "fetch_and_cache"])(
    'accepts "%s"',
    (val) => {
      expect(ToolName.parse(val)).toBe(val);
    },
  );

  it("rejects unknown tool", () => {
    expect(() => ToolName.parse("roll_dice")).toThrow();
  });
});

describe("MessageRole", () => {
  it.each(["system", "user", "assistant"])('accepts "%s"', (val) => {
    expect(MessageRole.parse(val)).toBe(val);
  });

  it("rejects tool role", () => {
    expect(() => MessageRole.parse("tool")).toThrow();
  });
});

describe("ConversationStatus", () => {
  it.each(["final_answer", "budget_exhausted"])('accepts "%s"', (val) => {
    expect(ConversationStatus.parse(val)).toBe(val);
  });
});
