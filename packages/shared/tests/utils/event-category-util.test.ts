import { describe, expect, it } from "vitest";
import {
  deriveCategory,
  joinTags,
  splitTags,
} from "../../src/utils/event-category-util.ts";
import { DEFAULT_CATEGORY_RULES } from "../../src/config/category-config.ts";

describe("event-category-util deriveCategory", () => {
  it("maps keywords to categories", () => {
    expect(deriveCategory("soccer,athletic")).toBe("Sports");
    expect(deriveCategory("study group")).toBe("Academic");
    expect(deriveCategory("social")).toBe("Social");
    expect(deriveCategory("music")).toBe("Clubs");
  });

  it("takes the first matching rule in table order", () => {
    expect(deriveCategory("career fair")).toBe("Academic");
    expect(deriveCategory("sports club")).toBe("Sports");
  });

  it("matches substrings case-insensitively", () => {
    expect(deriveCategory("Clubhouse")).toBe("Clubs");
    expect(deriveCategory("SPORTS")).toBe("Sports");
  });

  it("accepts a tag list", () => {
    expect(deriveCategory(["open mic", "Music"])).toBe("Clubs");
  });

  it("falls back to the default category", () => {
    expect(deriveCategory("")).toBe("Academic");
    expect(deriveCategory(null)).toBe("Academic");
    expect(deriveCategory(["film"])).toBe("Academic");
  });

  it("uses a replacement table and fallback", () => {
    const rules = [{ category: "Arts", keywords: ["paint", "film"] }];

    expect(deriveCategory(["Painting"], rules, "Other")).toBe("Arts");
    expect(deriveCategory(["soccer"], rules, "Other")).toBe("Other");
  });

  it("keeps the default table ordered", () => {
    expect(DEFAULT_CATEGORY_RULES.map((rule) => rule.category)).toEqual([
      "Sports",
      "Academic",
      "Social",
      "Clubs",
    ]);
  });
});

describe("event-category-util tags", () => {
  it("joins tags into the lowercase wire form", () => {
    expect(joinTags([" Soccer ", "", "Athletic"])).toBe("soccer,athletic");
    expect(joinTags([])).toBe("");
  });

  it("splits the wire form, dropping blanks and duplicates", () => {
    expect(splitTags("soccer, athletic,,soccer")).toEqual([
      "soccer",
      "athletic",
    ]);
    expect(splitTags("")).toEqual([]);
    expect(splitTags(null)).toEqual([]);
  });
});
