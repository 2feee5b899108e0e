import type { CategoryRule } from "../types.ts";

/**
 * Ordered keyword table used to derive a display category from an event's tags.
 * The first rule with a keyword contained in the lowercased tag string wins.
 */
export const DEFAULT_CATEGORY_RULES: readonly CategoryRule[] = [
  { category: "Sports", keywords: ["sport", "athletic"] },
  { category: "Academic", keywords: ["academic", "study", "career"] },
  { category: "Social", keywords: ["social", "fair"] },
  { category: "Clubs", keywords: ["club", "music"] },
];

export const DEFAULT_CATEGORY = "Academic";

export const CATEGORY_SELECTORS = [
  "All",
  "Sports",
  "Academic",
  "Social",
  "Clubs",
] as const;

export type CategorySelector = typeof CATEGORY_SELECTORS[number];
