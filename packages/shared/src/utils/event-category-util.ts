import {
  DEFAULT_CATEGORY,
  DEFAULT_CATEGORY_RULES,
} from "../config/category-config.ts";
import type { CategoryRule } from "../types.ts";

/**
 * Join tags into the comma-separated lowercase form the API stores.
 */
export function joinTags(tags: readonly string[]): string {
  return tags
    .map((tag) => tag.trim().toLowerCase())
    .filter((tag) => tag.length > 0)
    .join(",");
}

/**
 * Split the API's comma-joined tag string, preserving order and dropping
 * duplicates and blanks.
 */
export function splitTags(tagString: string | null | undefined): string[] {
  if (!tagString) return [];

  const seen = new Set<string>();
  for (const tag of tagString.split(",")) {
    const trimmed = tag.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

/**
 * First-match keyword lookup over the lowercased tag string.
 * Falls back to the default category when no keyword matches.
 */
export function deriveCategory(
  tags: string | readonly string[] | null | undefined,
  rules: readonly CategoryRule[] = DEFAULT_CATEGORY_RULES,
  fallback: string = DEFAULT_CATEGORY,
): string {
  const tagString = (typeof tags === "string" ? tags : (tags ?? []).join(","))
    .toLowerCase();

  const match = rules.find((rule) =>
    rule.keywords.some((keyword) => tagString.includes(keyword.toLowerCase()))
  );

  return match?.category ?? fallback;
}
