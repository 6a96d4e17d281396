import type { ComponentRole, ManifestRecord, MaskRole, PartKey } from "@part-sorter/schema";

export interface FileRecord {
  path: string;
  fileName: string;
}

export interface PartGroup {
  key: PartKey;
  /** Main art per role, in discovery order. */
  candidates: Record<ComponentRole, FileRecord[]>;
  /** Overlay masks, battler roles only. */
  masks: Record<MaskRole, FileRecord[]>;
}

/** Part key id (`Female/Clothing/p01`) to group, for exactly one scan pass. */
export type GroupIndex = ReadonlyMap<string, PartGroup>;

export type Selection = Partial<Record<ComponentRole, FileRecord | null>>;

export interface FilenameClassification {
  category: PartKey["category"];
  partNum: string;
}

export type ProgressReporter = (message: string) => void;

export type RelocationOutcome =
  | { kind: "nothing_to_transfer"; key: PartKey }
  | { kind: "relocated"; key: PartKey; manifest: ManifestRecord; manifestPath: string; partFolder: string };

export interface IndexSummary {
  groups: number;
  candidates: Record<ComponentRole, number>;
  masks: Record<MaskRole, number>;
  orphanMaskOnly: number;
  missingMain: number;
}
