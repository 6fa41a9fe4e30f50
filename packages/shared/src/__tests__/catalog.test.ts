import { describe, expect, it } from "vitest";
import {
  CachedDetail,
  CatalogRecord,
  NameIndex,
  ResolvedReference,
  toCatalogEntry,
} from "../catalog.js";

describe("CatalogRecord", () => {
  it("parses a builder line", () => {
    const record = CatalogRecord.parse({
      type: "monsters",
      name: "Zombie",
      slug_or_index: "zombie",
      api_url: "https://catalog.test/v1/monsters/zombie/",
      document_slug: "srd-2014",
      document_title: "Systems Reference Document",
      raw: { hit_points: 22 },
    });
    expect(record.slug_or_index).toBe("zombie");
    expect(record.document_slug).toBe("srd-2014");
  });

  it("fills nullable fields with null", () => {
    const record = CatalogRecord.parse({ type: "conditions", slug_or_index: "prone" });
    expect(record.name).toBeNull();
    expect(record.api_url).toBeNull();
    expect(record.document_slug).toBeNull();
    expect(record.document_title).toBeNull();
  });

  it("rejects a line without a slug", () => {
    expect(() => CatalogRecord.parse({ type: "spells", name: "Fireball" })).toThrow();
  });
});

describe("toCatalogEntry", () => {
  it("normalizes field names", () => {
    const entry = toCatalogEntry(
      CatalogRecord.parse({
        type: "armor",
        name: "Studded Leather Armor",
        slug_or_index: "studded-leather-armor",
        api_url: "https://catalog.test/v1/armor/studded-leather-armor/",
        document_slug: "srd-2014",
        document_title: null,
      }),
    );
    expect(entry).toEqual({
      type: "armor",
      name: "Studded Leather Armor",
      slug: "studded-leather-armor",
      apiUrl: "https://catalog.test/v1/armor/studded-leather-armor/",
      documentSlug: "srd-2014",
      documentTitle: null,
    });
  });

  it("turns a null name into an empty string", () => {
    const entry = toCatalogEntry(CatalogRecord.parse({ type: "planes", slug_or_index: "astral" }));
    expect(entry.name).toBe("");
  });
});

describe("NameIndex", () => {
  it("accepts name -> slug lists", () => {
    const index = NameIndex.parse({ Zombie: ["zombie", "a5e-zombie"] });
    expect(index.Zombie).toEqual(["zombie", "a5e-zombie"]);
  });

  it("rejects non-array values", () => {
    expect(() => NameIndex.parse({ Zombie: "zombie" })).toThrow();
  });
});

describe("ResolvedReference", () => {
  it("requires all three fields", () => {
    expect(() => ResolvedReference.parse({ chosen_name: "Zombie", chosen_slug: "zombie" })).toThrow();
  });
});

describe("CachedDetail", () => {
  it("keeps data verbatim", () => {
    const detail = CachedDetail.parse({
      slug: "fireball",
      api_url: "https://catalog.test/v1/spells/fireball/",
      data: { level: 3, school: "evocation" },
    });
    expect(detail.data).toEqual({ level: 3, school: "evocation" });
  });
});

describe("CachedDetail passthrough", () => {
  it("keeps keys written by other tools", () => {
    const detail = CachedDetail.parse({
      slug: "zombie",
      api_url: "https://catalog.test/v1/monsters/zombie/",
      data: {},
      fetched_by: "import",
    });
    expect(detail).toEqual({
      slug: "zombie",
      api_url: "https://catalog.test/v1/monsters/zombie/",
      data: {},
      fetched_by: "import",
    });
  });
});
