import { describe, expect, it } from "vitest";
import {
  CallPayload,
  FetchAndCacheArgs,
  LookMonsterTableArgs,
  LookTableArgs,
  SearchTableArgs,
  ToolCall,
} from "../tools.js";

// ---------------------------------------------------------------------------
// Raw payload
// ---------------------------------------------------------------------------

describe("CallPayload", () => {
  it("accepts fn + args", () => {
    const parsed = CallPayload.parse({ fn: "search_table", args: { type: "spells" } });
    expect(parsed).toEqual({ fn: "search_table", args: { type: "spells" } });
  });

  it("defaults args to an empty object", () => {
    expect(CallPayload.parse({ fn: "look_monster_table" }).args).toEqual({});
  });

  it("rejects a missing fn", () => {
    expect(() => CallPayload.parse({ args: {} })).toThrow();
  });

  it("rejects a non-object args", () => {
    expect(() => CallPayload.parse({ fn: "look_table", args: "zombie" })).toThrow();
  });
});

// ---------------------------------------------------------------------------
// Tool argument schemas
// ---------------------------------------------------------------------------

describe("LookMonsterTableArgs", () => {
  it("applies defaults", () => {
    expect(LookMonsterTableArgs.parse({})).toEqual({ query: "", limit: 20 });
  });

  it("coerces a numeric string limit", () => {
    expect(LookMonsterTableArgs.parse({ query: "dragon", limit: "5" }).limit).toBe(5);
  });

  it("rejects a zero limit", () => {
    expect(() => LookMonsterTableArgs.parse({ query: "dragon", limit: 0 })).toThrow();
  });
});

describe("LookTableArgs", () => {
  it("defaults type to monsters", () => {
    expect(LookTableArgs.parse({ query: "orc" })).toEqual({
      type: "monsters",
      query: "orc",
      limit: 20,
    });
  });

  it("rejects an unknown type", () => {
    expect(() => LookTableArgs.parse({ type: "vehicles", query: "cart" })).toThrow();
  });
});

describe("SearchTableArgs", () => {
  it("defaults prefer_doc to null", () => {
    expect(SearchTableArgs.parse({ type: "spells", name_or_slug: "Fireball" })).toEqual({
      type: "spells",
      name_or_slug: "Fireball",
      prefer_doc: null,
    });
  });

  it("keeps an explicit prefer_doc", () => {
    const parsed = SearchTableArgs.parse({
      type: "monsters",
      name_or_slug: "Zombie",
      prefer_doc: "srd-2014",
    });
    expect(parsed.prefer_doc).toBe("srd-2014");
  });

  it("rejects an empty name_or_slug", () => {
    expect(() => SearchTableArgs.parse({ type: "spells", name_or_slug: "" })).toThrow();
  });
});

describe("FetchAndCacheArgs", () => {
  it("accepts type + slug", () => {
    expect(FetchAndCacheArgs.parse({ type: "spells", slug: "fireball" })).toEqual({
      type: "spells",
      slug: "fireball",
    });
  });

  it("rejects a missing slug", () => {
    expect(() => FetchAndCacheArgs.parse({ type: "spells" })).toThrow();
  });
});

// ---------------------------------------------------------------------------
// Discriminated union
// ---------------------------------------------------------------------------

describe("ToolCall (discriminated union)", () => {
  it("discriminates fetch_and_cache", () => {
    const parsed = ToolCall.parse({
      fn: "fetch_and_cache",
      args: { type: "spells", slug: "fireball" },
    });
    expect(parsed.fn).toBe("fetch_and_cache");
    if (parsed.fn === "fetch_and_cache") {
      expect(parsed.args.slug).toBe("fireball");
    }
  });

  it("discriminates look_monster_table with defaults", () => {
    const parsed = ToolCall.parse({ fn: "look_monster_table", args: { query: "zombie" } });
    expect(parsed).toEqual({
      fn: "look_monster_table",
      args: { query: "zombie", limit: 20 },
    });
  });

  it("rejects an unknown fn", () => {
    expect(() => ToolCall.parse({ fn: "roll", args: {} })).toThrow();
  });

  it("rejects args that do not match the selected tool", () => {
    const result = ToolCall.safeParse({ fn: "search_table", args: { type: "spells" } });
    expect(result.success).toBe(false);
  });
});
