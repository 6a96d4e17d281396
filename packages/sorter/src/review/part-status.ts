import type { ComponentRole, MaskRole } from "@part-sorter/schema";
import { MAIN_ROLES, MASK_ROLES } from "../constants.js";
import type { GroupIndex, IndexSummary, PartGroup } from "../types.js";
import { hasMissingMain } from "./query-view.js";

/**
 * present: masks and main sheet found
 * orphan:  masks found, main sheet missing
 * missing: main sheet found, no mask
 * absent:  neither
 */
export type MaskStatus = "present" | "orphan" | "missing" | "absent";

export interface PartStatus {
  candidateCounts: Record<ComponentRole, number>;
  maskCounts: Record<MaskRole, number>;
  maskStatus: Record<MaskRole, MaskStatus>;
  missingRoles: ComponentRole[];
  orphanMaskOnly: boolean;
}

export function hasAnyMain(group: PartGroup): boolean {
  return MAIN_ROLES.some((role) => group.candidates[role].length > 0);
}

export function hasAnyMask(group: PartGroup): boolean {
  return MASK_ROLES.some((role) => group.masks[role].length > 0);
}

export function isOrphanMaskOnly(group: PartGroup): boolean {
  return !hasAnyMain(group) && hasAnyMask(group);
}

export function maskStatus(group: PartGroup, role: MaskRole): MaskStatus {
  const hasMain = group.candidates[role].length > 0;
  const hasMask = group.masks[role].length > 0;
  if (hasMask) {
    return hasMain ? "present" : "orphan";
  }
  return hasMain ? "missing" : "absent";
}

export function describePartStatus(group: PartGroup): PartStatus {
  return {
    candidateCounts: {
      FACE: group.candidates.FACE.length,
      SV: group.candidates.SV.length,
      TV: group.candidates.TV.length,
      TVD: group.candidates.TVD.length,
      ICON: group.candidates.ICON.length
    },
    maskCounts: {
      SV: group.masks.SV.length,
      TV: group.masks.TV.length,
      TVD: group.masks.TVD.length
    },
    maskStatus: {
      SV: maskStatus(group, "SV"),
      TV: maskStatus(group, "TV"),
      TVD: maskStatus(group, "TVD")
    },
    missingRoles: MAIN_ROLES.filter((role) => group.candidates[role].length === 0),
    orphanMaskOnly: isOrphanMaskOnly(group)
  };
}

export function summarizeIndex(index: GroupIndex): IndexSummary {
  const summary: IndexSummary = {
    groups: index.size,
    candidates: { FACE: 0, SV: 0, TV: 0, TVD: 0, ICON: 0 },
    masks: { SV: 0, TV: 0, TVD: 0 },
    orphanMaskOnly: 0,
    missingMain: 0
  };

  for (const group of index.values()) {
    for (const role of MAIN_ROLES) {
      summary.candidates[role] += group.candidates[role].length;
    }
    for (const role of MASK_ROLES) {
      summary.masks[role] += group.masks[role].length;
    }
    if (isOrphanMaskOnly(group)) {
      summary.orphanMaskOnly += 1;
    }
    if (hasMissingMain(group)) {
      summary.missingMain += 1;
    }
  }

  return summary;
}
