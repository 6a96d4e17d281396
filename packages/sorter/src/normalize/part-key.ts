import { PartKeySchema, type ManifestKey, type PartKey } from "@part-sorter/schema";
import { ALL_CATEGORIES, ALL_GENDERS } from "../constants.js";

export function formatPartNumber(value: number): string {
  return String(value).padStart(2, "0");
}

export function createPartKey(input: { gender: string; category: string; partNum: string }): PartKey {
  return PartKeySchema.parse(input);
}

export function partKeyId(key: PartKey): string {
  return `${key.gender}/${key.category}/p${key.partNum}`;
}

/**
 * Parses `Female/Clothing/p01` (also `female/clothing/1`) back into a key.
 * Returns null when any segment is unknown.
 */
export function parsePartKeyId(value: string): PartKey | null {
  const segments = value.trim().split(/[/\\]/);
  if (segments.length !== 3) {
    return null;
  }

  const [rawGender, rawCategory, rawPart] = segments;
  const gender = ALL_GENDERS.find((candidate) => candidate.toLowerCase() === rawGender.toLowerCase());
  const category = ALL_CATEGORIES.find((candidate) => candidate.toLowerCase() === rawCategory.toLowerCase());
  const partMatch = rawPart.match(/^p?(\d{1,3})$/i);
  if (!gender || !category || !partMatch) {
    return null;
  }

  return createPartKey({ gender, category, partNum: formatPartNumber(Number(partMatch[1])) });
}

export function partKeysEqual(left: PartKey, right: PartKey): boolean {
  return left.gender === right.gender && left.category === right.category && left.partNum === right.partNum;
}

export function describePartKey(key: PartKey): string {
  return `${key.gender} ${key.category} p${key.partNum}`;
}

export function toManifestKey(key: PartKey): ManifestKey {
  return {
    gender: key.gender,
    category: key.category,
    part_num: key.partNum
  };
}
