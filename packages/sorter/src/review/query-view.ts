import type { PartKey } from "@part-sorter/schema";
import { MAIN_ROLES } from "../constants.js";
import { partKeysEqual } from "../normalize/part-key.js";
import type { GroupIndex, PartGroup } from "../types.js";

export interface PartQuery {
  filterText?: string;
  missingOnly?: boolean;
}

export function comparePartKeys(left: PartKey, right: PartKey): number {
  if (left.gender !== right.gender) {
    return left.gender < right.gender ? -1 : 1;
  }
  if (left.category !== right.category) {
    return left.category < right.category ? -1 : 1;
  }
  return Number(left.partNum) - Number(right.partNum);
}

export function sortPartKeys(keys: Iterable<PartKey>): PartKey[] {
  return [...keys].sort(comparePartKeys);
}

/**
 * Ordered view over an index. Recomputed from scratch on every call; the
 * cursor into the result belongs to the caller.
 */
export function queryPartKeys(index: GroupIndex, query: PartQuery = {}): PartKey[] {
  const needle = (query.filterText ?? "").trim().toLowerCase();
  const keys: PartKey[] = [];

  for (const group of index.values()) {
    if (needle && !matchesFilterText(group.key, needle)) {
      continue;
    }
    if (query.missingOnly && !hasMissingMain(group)) {
      continue;
    }
    keys.push(group.key);
  }

  return sortPartKeys(keys);
}

export function matchesFilterText(key: PartKey, needle: string): boolean {
  const normalized = needle.trim().toLowerCase();
  if (!normalized) {
    return true;
  }
  return (
    key.gender.toLowerCase().includes(normalized) ||
    key.category.toLowerCase().includes(normalized) ||
    key.partNum.includes(normalized) ||
    `p${key.partNum}`.includes(normalized)
  );
}

export function hasMissingMain(group: PartGroup): boolean {
  return MAIN_ROLES.some((role) => group.candidates[role].length === 0);
}

export function clampCursor(cursor: number, length: number): number {
  if (length <= 0) {
    return 0;
  }
  return Math.max(0, Math.min(cursor, length - 1));
}

export function stepCursor(cursor: number, delta: number, length: number): number {
  return clampCursor(cursor + delta, length);
}

export function keyAt(keys: readonly PartKey[], cursor: number): PartKey | null {
  if (keys.length === 0) {
    return null;
  }
  return keys[clampCursor(cursor, keys.length)];
}

export function findPartKeyIndex(keys: readonly PartKey[], key: PartKey): number {
  return keys.findIndex((candidate) => partKeysEqual(candidate, key));
}
