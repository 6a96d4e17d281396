import path from "node:path";
import {
  ManifestRecordSchema,
  type CollisionPolicy,
  type ComponentRole,
  type ManifestRecord,
  type MaskRole,
  type PartKey,
  type TransferMode
} from "@part-sorter/schema";
import { MAIN_ROLES, MANIFEST_FILE_NAMES, MASK_FOLDER_SUFFIX, MASK_ROLES, SORT_FOLDER_NAME } from "../constants.js";
import { CollisionError, SelectionError } from "../errors.js";
import { ensureDirectory, pathExists, transferFile } from "../io/transfer-file.js";
import { writeJsonFile } from "../io/write-json.js";
import { describePartKey, toManifestKey } from "../normalize/part-key.js";
import type { FileRecord, PartGroup, ProgressReporter, RelocationOutcome, Selection } from "../types.js";

export interface RelocatePartOptions {
  root: string;
  group: PartGroup;
  selection: Selection;
  mode: TransferMode;
  collisionPolicy?: CollisionPolicy;
  onProgress?: ProgressReporter;
}

type PlannedTransfer =
  | { kind: "main"; role: ComponentRole; source: FileRecord; destination: string }
  | { kind: "mask"; role: MaskRole; source: FileRecord; destination: string };

export function partFolderFor(root: string, key: PartKey): string {
  return path.join(root, SORT_FOLDER_NAME, key.gender, `${key.category}_p${key.partNum}`);
}

/** First candidate of every role, like a freshly opened review panel. */
export function defaultSelection(group: PartGroup): Selection {
  const selection: Selection = {};
  for (const role of MAIN_ROLES) {
    selection[role] = group.candidates[role][0] ?? null;
  }
  return selection;
}

/**
 * Copies or moves the chosen main sheets plus every mask of one part into
 * `<root>/Sort/<gender>/<category>_p<NN>/`, then writes the audit record.
 *
 * The record is written only after every transfer succeeded. A failed
 * transfer throws a TransferError and leaves no record behind. After a move
 * the index the group came from is stale and must be rebuilt.
 */
export async function relocatePart(options: RelocatePartOptions): Promise<RelocationOutcome> {
  const { group, mode } = options;
  const chosen = resolveSelection(group, options.selection);
  const hasMasks = MASK_ROLES.some((role) => group.masks[role].length > 0);
  if (chosen.length === 0 && !hasMasks) {
    return { kind: "nothing_to_transfer", key: group.key };
  }

  const partFolder = partFolderFor(options.root, group.key);
  const plan = planTransfers(partFolder, group, chosen);

  if ((options.collisionPolicy ?? "overwrite") === "reject") {
    const existing: string[] = [];
    for (const transfer of plan) {
      if (await pathExists(transfer.destination)) {
        existing.push(transfer.destination);
      }
    }
    if (existing.length > 0) {
      throw new CollisionError(existing);
    }
  }

  const manifest: ManifestRecord = {
    mode,
    key: toManifestKey(group.key),
    selected: {},
    masks: { SV: [], TV: [], TVD: [] }
  };

  for (const transfer of plan) {
    await ensureDirectory(path.dirname(transfer.destination), transfer.source.path);
    await transferFile(transfer.source.path, transfer.destination, mode);
    options.onProgress?.(`[${mode}] ${transfer.source.path} -> ${transfer.destination}`);

    const record = { from: transfer.source.path, to: transfer.destination };
    if (transfer.kind === "main") {
      manifest.selected[transfer.role] = record;
    } else {
      manifest.masks[transfer.role].push(record);
    }
  }

  const manifestPath = path.join(partFolder, MANIFEST_FILE_NAMES[mode]);
  await writeJsonFile(manifestPath, ManifestRecordSchema.parse(manifest));
  options.onProgress?.(`[${mode}] ${describePartKey(group.key)}: wrote ${manifestPath}`);

  return { kind: "relocated", key: group.key, manifest, manifestPath, partFolder };
}

function resolveSelection(group: PartGroup, selection: Selection): Array<{ role: ComponentRole; file: FileRecord }> {
  const chosen: Array<{ role: ComponentRole; file: FileRecord }> = [];

  for (const role of MAIN_ROLES) {
    const requested = selection[role];
    if (!requested) {
      continue;
    }
    const file = group.candidates[role].find((candidate) => candidate.path === requested.path);
    if (!file) {
      throw new SelectionError(
        `${requested.path} is not a ${role} candidate for ${describePartKey(group.key)}`
      );
    }
    chosen.push({ role, file });
  }

  return chosen;
}

function planTransfers(
  partFolder: string,
  group: PartGroup,
  chosen: Array<{ role: ComponentRole; file: FileRecord }>
): PlannedTransfer[] {
  const plan = chosen.map(({ role, file }): PlannedTransfer => ({
    kind: "main",
    role,
    source: file,
    destination: path.join(partFolder, role, file.fileName)
  }));

  // Masks are never a user choice: all of them travel with the part.
  for (const role of MASK_ROLES) {
    for (const mask of group.masks[role]) {
      plan.push({
        kind: "mask",
        role,
        source: mask,
        destination: path.join(partFolder, `${role}${MASK_FOLDER_SUFFIX}`, mask.fileName)
      });
    }
  }

  return plan;
}
