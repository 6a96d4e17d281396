#!/usr/bin/env node

import path from "node:path";
import {
  CollisionPolicySchema,
  TransferModeSchema,
  type CollisionPolicy,
  type ComponentRole,
  type MaskRole,
  type PartKey,
  type TransferMode
} from "@part-sorter/schema";
import { loadSorterConfig, type SorterConfig } from "./config.js";
import { MAIN_ROLES, MASK_ROLES, ROOT_ENV_VAR } from "./constants.js";
import { describePartKey, parsePartKeyId, partKeyId } from "./normalize/part-key.js";
import { defaultSelection } from "./relocate/relocate-part.js";
import { findManifests, verifyManifest } from "./relocate/verify-manifest.js";
import { describePartStatus, summarizeIndex, type PartStatus } from "./review/part-status.js";
import { ReviewSession } from "./review/review-session.js";
import type { PartGroup, Selection } from "./types.js";

type Flags = Map<string, string | boolean>;

const ROLE_FLAGS: Record<ComponentRole, string> = {
  FACE: "--face",
  SV: "--sv",
  TV: "--tv",
  TVD: "--tvd",
  ICON: "--icon"
};

async function main(): Promise<void> {
  const config = loadSorterConfig();
  const [command, ...args] = process.argv.slice(2);
  const flags = parseFlags(args);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printUsage();
    return;
  }

  const root = resolveRoot(flags, config);
  const session = await ReviewSession.open(root, {
    collisionPolicy: getCollisionFlag(flags) ?? config.collisionPolicy,
    onProgress: config.verbose || getBooleanFlag(flags, "--verbose") ? (message) => console.log(message) : undefined
  });

  if (command === "scan") {
    const summary = summarizeIndex(session.groupIndex);
    console.log(`Root: ${session.root}`);
    console.log(`Parts: ${summary.groups}`);
    console.log(`Candidates: ${MAIN_ROLES.map((role) => `${role}=${summary.candidates[role]}`).join(" ")}`);
    console.log(`Masks: ${MASK_ROLES.map((role) => `${role}=${summary.masks[role]}`).join(" ")}`);
    console.log(`Missing a main sheet: ${summary.missingMain}`);
    console.log(`Orphan mask-only parts: ${summary.orphanMaskOnly}`);
    return;
  }

  if (command === "list") {
    session.setFilter(getStringFlag(flags, "--filter") ?? "");
    session.setMissingOnly(getBooleanFlag(flags, "--missing-only"));
    const keys = session.visibleKeys;
    if (keys.length === 0) {
      console.log("No matching parts found with current filter.");
      return;
    }
    keys.forEach((key, position) => {
      const group = session.groupIndex.get(partKeyId(key));
      if (group) {
        console.log(`${position + 1}/${keys.length} ${partKeyId(key)} ${formatStatusLine(describePartStatus(group))}`);
      }
    });
    return;
  }

  if (command === "show") {
    const group = requireGroup(session, flags);
    printGroup(group);
    return;
  }

  if (command === "sort") {
    const group = requireGroup(session, flags);
    const mode = getModeFlag(flags);
    session.jumpTo(group.key);
    const outcome = await session.relocateCurrent(buildSelection(group, flags), mode);
    if (!outcome || outcome.kind === "nothing_to_transfer") {
      console.log(`Nothing to sort for ${describePartKey(group.key)}: no files were selected or found.`);
      return;
    }
    console.log(`Sorted files for ${describePartKey(outcome.key)} (${mode}) into: ${outcome.partFolder}`);
    console.log(`Record: ${outcome.manifestPath}`);
    const next = session.current();
    if (next) {
      console.log(`Next: ${partKeyId(next.key)} (${next.position + 1}/${next.total})`);
    }
    return;
  }

  if (command === "verify") {
    const manifestPaths = await findManifests(session.root);
    let failures = 0;
    for (const manifestPath of manifestPaths) {
      const result = await verifyManifest(manifestPath);
      if (result.ok) {
        console.log(`ok   ${manifestPath}`);
        continue;
      }
      failures += 1;
      console.log(`FAIL ${manifestPath}`);
      for (const missing of result.missingDestinations) {
        console.log(`  missing destination: ${missing}`);
      }
      for (const lingering of result.lingeringSources) {
        console.log(`  source still present: ${lingering}`);
      }
    }
    console.log(`Records: ${manifestPaths.length}, failed: ${failures}`);
    if (failures > 0) {
      process.exitCode = 1;
    }
    return;
  }

  throw new Error(`Unknown command: ${command}`);
}

function printGroup(group: PartGroup): void {
  const status = describePartStatus(group);
  console.log(describePartKey(group.key));

  for (const role of MAIN_ROLES) {
    const candidates = group.candidates[role];
    if (candidates.length === 0) {
      console.log(`  ${role}: missing`);
      continue;
    }
    console.log(`  ${role}: ${candidates.length} option(s)`);
    candidates.forEach((candidate, index) => console.log(`    ${index + 1}. ${candidate.fileName}`));
  }

  for (const role of MASK_ROLES) {
    console.log(`  ${formatMaskLine(role, status)}`);
    for (const mask of group.masks[role]) {
      console.log(`    - ${mask.fileName}`);
    }
  }

  if (status.orphanMaskOnly) {
    const counts = MASK_ROLES.filter((role) => status.maskCounts[role] > 0).map(
      (role) => `${role}=${status.maskCounts[role]}`
    );
    console.log(`  Orphan mask-only entry: found mask sheet(s) (${counts.join(", ")}) but no main sheets.`);
  }
}

function formatMaskLine(role: MaskRole, status: PartStatus): string {
  const count = status.maskCounts[role];
  switch (status.maskStatus[role]) {
    case "present":
      return `${role} mask: ${count} found`;
    case "orphan":
      return `${role} mask: ${count} found but main sheet is missing`;
    case "missing":
      return `${role} mask: missing (no *_c mask file found)`;
    case "absent":
      return `${role} mask: none, and main sheet missing`;
  }
}

function formatStatusLine(status: PartStatus): string {
  const counts = MAIN_ROLES.map((role) => `${role}=${status.candidateCounts[role]}`).join(" ");
  const masks = MASK_ROLES.map((role) => `${role}:${status.maskStatus[role]}`).join(" ");
  return `${counts} | masks ${masks}${status.orphanMaskOnly ? " | orphan masks only" : ""}`;
}

function buildSelection(group: PartGroup, flags: Flags): Selection {
  const selection = defaultSelection(group);

  for (const role of MAIN_ROLES) {
    const flag = ROLE_FLAGS[role];
    const value = getStringFlag(flags, flag);
    if (!value) {
      continue;
    }
    if (value.toLowerCase() === "none") {
      selection[role] = null;
      continue;
    }

    const candidates = group.candidates[role];
    const choice = Number(value);
    if (!Number.isInteger(choice) || choice < 1 || choice > candidates.length) {
      throw new Error(`${flag} must be "none" or an option number between 1 and ${candidates.length}`);
    }
    selection[role] = candidates[choice - 1];
  }

  return selection;
}

function requireGroup(session: ReviewSession, flags: Flags): PartGroup {
  const rawKey = getStringFlag(flags, "--key");
  if (!rawKey) {
    throw new Error("Missing required --key <Gender/Category/pNN>.");
  }
  const key: PartKey | null = parsePartKeyId(rawKey);
  if (!key) {
    throw new Error(`Invalid --key value: ${rawKey}`);
  }
  const group = session.groupIndex.get(partKeyId(key));
  if (!group) {
    throw new Error(`No files found for ${describePartKey(key)}`);
  }
  return group;
}

function resolveRoot(flags: Flags, config: SorterConfig): string {
  const root = getStringFlag(flags, "--root") ?? config.root;
  if (!root) {
    throw new Error(`Missing --root <dir> (or set ${ROOT_ENV_VAR}).`);
  }
  return path.resolve(process.cwd(), root);
}

function getModeFlag(flags: Flags): TransferMode {
  const raw = getStringFlag(flags, "--mode") ?? "copy";
  const parsed = TransferModeSchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    throw new Error(`Invalid --mode value: ${raw}`);
  }
  return parsed.data;
}

function getCollisionFlag(flags: Flags): CollisionPolicy | undefined {
  const raw = getStringFlag(flags, "--collision");
  if (!raw) {
    return undefined;
  }
  const parsed = CollisionPolicySchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    throw new Error(`Invalid --collision value: ${raw}`);
  }
  return parsed.data;
}

function parseFlags(args: string[]): Flags {
  const flags: Flags = new Map();

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token.startsWith("--")) {
      continue;
    }

    const maybeValue = args[index + 1];
    if (maybeValue === undefined || maybeValue.startsWith("--")) {
      flags.set(token, true);
      continue;
    }

    flags.set(token, maybeValue);
    index += 1;
  }

  return flags;
}

function getStringFlag(flags: Flags, key: string): string | undefined {
  const value = flags.get(key);
  if (typeof value !== "string") {
    return undefined;
  }
  return value;
}

function getBooleanFlag(flags: Flags, key: string): boolean {
  return flags.get(key) === true;
}

function printUsage(): void {
  console.log(`
Usage:
  npm run sorter -- <command> --root <generator root> [options]

Commands:
  scan                     Summarize the parts found under the root
  list                     One line per part, sorted by gender, category, part number
  show                     Candidates and mask status of one part (requires --key)
  sort                     Copy or move one part into Sort/ (requires --key)
  verify                   Check every manifest/copy log under Sort/ against the disk

Options:
  --root <dir>             Generator root (default: $${ROOT_ENV_VAR})
  --filter <text>          list: keep parts whose gender, category or pNN contains text
  --missing-only           list: keep parts missing at least one main sheet
  --key <id>               Part id, e.g. Female/Clothing/p01
  --mode <copy|move>       sort: default copy
  --face|--sv|--tv|--tvd|--icon <n|none>
                           sort: option number to take per role (default 1), or none
  --collision <overwrite|reject>
                           sort: what to do with an existing destination file
  --verbose                Print per-folder and per-file progress

Environment overrides:
  ${ROOT_ENV_VAR}         Default for --root
  PART_SORTER_COLLISION    overwrite | reject (default: overwrite)
  PART_SORTER_VERBOSE      1 or true to print progress
`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
