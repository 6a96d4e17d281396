import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { ManifestRecordSchema, type ManifestRecord, type TransferRecord } from "@part-sorter/schema";
import { ALL_GENDERS, MANIFEST_FILE_NAMES, SORT_FOLDER_NAME } from "../constants.js";
import { ManifestFormatError, ScanError, errorCode } from "../errors.js";
import { pathExists } from "../io/transfer-file.js";

export interface ManifestVerification {
  manifestPath: string;
  manifest: ManifestRecord;
  /** `to` paths that are not on disk. */
  missingDestinations: string[];
  /** `from` paths still on disk although the record says they were moved. */
  lingeringSources: string[];
  ok: boolean;
}

export async function readManifest(manifestPath: string): Promise<ManifestRecord> {
  const raw = await readFile(manifestPath, "utf8");
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new ManifestFormatError(manifestPath, error instanceof Error ? error.message : String(error));
  }

  const parsed = ManifestRecordSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ManifestFormatError(manifestPath, parsed.error.issues[0]?.message ?? "unknown error");
  }
  return parsed.data;
}

export async function verifyManifest(manifestPath: string): Promise<ManifestVerification> {
  const manifest = await readManifest(manifestPath);
  const transfers = listTransfers(manifest);
  const missingDestinations: string[] = [];
  const lingeringSources: string[] = [];

  for (const transfer of transfers) {
    if (!(await pathExists(transfer.to))) {
      missingDestinations.push(transfer.to);
    }
    if (manifest.mode === "move" && (await pathExists(transfer.from))) {
      lingeringSources.push(transfer.from);
    }
  }

  return {
    manifestPath,
    manifest,
    missingDestinations,
    lingeringSources,
    ok: missingDestinations.length === 0 && lingeringSources.length === 0
  };
}

export function listTransfers(manifest: ManifestRecord): TransferRecord[] {
  const transfers: TransferRecord[] = [];
  for (const record of Object.values(manifest.selected)) {
    if (record) {
      transfers.push(record);
    }
  }
  transfers.push(...manifest.masks.SV, ...manifest.masks.TV, ...manifest.masks.TVD);
  return transfers;
}

/** Every manifest and copy log under `<root>/Sort/<gender>/<part folder>/`. */
export async function findManifests(root: string): Promise<string[]> {
  const found: string[] = [];
  const fileNames = Object.values(MANIFEST_FILE_NAMES);

  for (const gender of ALL_GENDERS) {
    const genderFolder = path.join(root, SORT_FOLDER_NAME, gender);
    const partFolders = await listSubfolders(genderFolder);
    for (const partFolder of partFolders) {
      for (const fileName of fileNames) {
        const candidate = path.join(genderFolder, partFolder, fileName);
        if (await pathExists(candidate)) {
          found.push(candidate);
        }
      }
    }
  }

  return found;
}

async function listSubfolders(folderPath: string): Promise<string[]> {
  try {
    const entries = await readdir(folderPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort((left, right) => left.localeCompare(right, undefined, { numeric: true }));
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return [];
    }
    throw new ScanError(folderPath, "readdir", error);
  }
}
