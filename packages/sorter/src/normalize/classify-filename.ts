import type { Category } from "@part-sorter/schema";
import { ALL_CATEGORIES, LAYERED_CATEGORIES } from "../constants.js";
import type { FilenameClassification } from "../types.js";
import { formatPartNumber } from "./part-key.js";

interface CategoryMatcher {
  category: Category;
  pattern: RegExp;
}

const PART_NUMBER_REGEX = /(?:^|[_-])p(\d{1,3})(?=[_.-]|$)/i;
const MASK_STEM_REGEX = /[_-]c\d*$/;

// Layered categories are tried first so "Clothing2" never falls through to a plain token.
const CATEGORY_MATCHERS: readonly CategoryMatcher[] = [
  ...ALL_CATEGORIES.filter((category) => LAYERED_CATEGORIES.has(category)).map((category) => ({
    category,
    pattern: new RegExp(`(?:^|[_-])${escapeRegExp(category)}[12]?(?:[_-]|$)`, "i")
  })),
  ...ALL_CATEGORIES.filter((category) => !LAYERED_CATEGORIES.has(category)).map((category) => ({
    category,
    pattern: new RegExp(`(?:^|[_-])${escapeRegExp(category)}(?:[_-]|$)`, "i")
  }))
];

export function detectCategory(fileName: string): Category | null {
  for (const matcher of CATEGORY_MATCHERS) {
    if (matcher.pattern.test(fileName)) {
      return matcher.category;
    }
  }
  return null;
}

/**
 * First `p<digits>` token, padded to two digits. Three-digit values are kept
 * whole (`p123` -> "123").
 */
export function detectPartNumber(fileName: string): string | null {
  const match = fileName.match(PART_NUMBER_REGEX);
  if (!match) {
    return null;
  }
  return formatPartNumber(Number(match[1]));
}

/** `*_c`, `*-c`, `*_c1`, `*-c12` stems (extension ignored). */
export function isMaskFile(fileName: string): boolean {
  const stem = fileName.replace(/\.[^.]+$/, "").toLowerCase();
  return MASK_STEM_REGEX.test(stem);
}

export function classifyFilename(fileName: string): FilenameClassification | null {
  const category = detectCategory(fileName);
  const partNum = detectPartNumber(fileName);
  if (!category || !partNum) {
    return null;
  }
  return { category, partNum };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
