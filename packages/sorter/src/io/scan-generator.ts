import { readdir } from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import type { ComponentRole, MaskRole, PartKey } from "@part-sorter/schema";
import { ALL_GENDERS, COMPONENT_FOLDERS, IMAGE_FILE_REGEX, MAIN_ROLES, MASK_ROLES } from "../constants.js";
import { ScanError, errorCode } from "../errors.js";
import { classifyFilename, isMaskFile } from "../normalize/classify-filename.js";
import { createPartKey, partKeyId } from "../normalize/part-key.js";
import type { GroupIndex, PartGroup, ProgressReporter } from "../types.js";

const MISSING_DIRECTORY_CODES = new Set(["ENOENT", "ENOTDIR"]);

export interface ScanGeneratorOptions {
  root: string;
  onProgress?: ProgressReporter;
}

/**
 * Walks `<root>/<component folder>/<gender>/` for every known pair and groups
 * the classified images by part key. A relative root is resolved against the
 * working directory, so record paths are always absolute. Absent folders contribute nothing; any
 * other listing failure aborts the scan with a ScanError.
 */
export async function scanGenerator(options: ScanGeneratorOptions): Promise<GroupIndex> {
  const root = path.resolve(options.root);
  const groups = new Map<string, PartGroup>();

  for (const component of COMPONENT_FOLDERS) {
    for (const gender of ALL_GENDERS) {
      const folderPath = path.join(root, component.folderName, gender);
      const entries = await listFolder(folderPath);
      if (!entries) {
        continue;
      }

      const imageEntries = entries
        .filter((entry) => entry.isFile() && IMAGE_FILE_REGEX.test(entry.name))
        .sort((left, right) => compareFileNames(left.name, right.name));
      options.onProgress?.(`[scan] ${component.folderName}/${gender}: ${imageEntries.length} image(s)`);

      for (const entry of imageEntries) {
        const classification = classifyFilename(entry.name);
        if (!classification) {
          continue;
        }

        const key = createPartKey({ gender, ...classification });
        const group = getOrCreateGroup(groups, key);
        const record = { path: path.join(folderPath, entry.name), fileName: entry.name };
        const maskRole = asMaskRole(component.role);

        if (maskRole && isMaskFile(entry.name)) {
          group.masks[maskRole].push(record);
        } else {
          group.candidates[component.role].push(record);
        }
      }
    }
  }

  for (const [id, group] of groups) {
    if (isEmptyGroup(group)) {
      groups.delete(id);
    }
  }

  return groups;
}

export function createEmptyGroup(key: PartKey): PartGroup {
  return {
    key,
    candidates: { FACE: [], SV: [], TV: [], TVD: [], ICON: [] },
    masks: { SV: [], TV: [], TVD: [] }
  };
}

function getOrCreateGroup(groups: Map<string, PartGroup>, key: PartKey): PartGroup {
  const id = partKeyId(key);
  const existing = groups.get(id);
  if (existing) {
    return existing;
  }
  const created = createEmptyGroup(key);
  groups.set(id, created);
  return created;
}

function isEmptyGroup(group: PartGroup): boolean {
  return (
    MAIN_ROLES.every((role) => group.candidates[role].length === 0) &&
    MASK_ROLES.every((role) => group.masks[role].length === 0)
  );
}

function asMaskRole(role: ComponentRole): MaskRole | null {
  return MASK_ROLES.find((maskRole) => maskRole === role) ?? null;
}

async function listFolder(folderPath: string): Promise<Dirent[] | null> {
  try {
    return await readdir(folderPath, { withFileTypes: true });
  } catch (error) {
    const code = errorCode(error);
    if (code && MISSING_DIRECTORY_CODES.has(code)) {
      return null;
    }
    throw new ScanError(folderPath, "readdir", error);
  }
}

function compareFileNames(left: string, right: string): number {
  const natural = left.localeCompare(right, undefined, { numeric: true, sensitivity: "base" });
  if (natural !== 0) {
    return natural;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}
