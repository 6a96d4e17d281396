export { loadSorterConfig } from "./config.js";
export type { SorterConfig } from "./config.js";
export * from "./constants.js";
export * from "./errors.js";
export { scanGenerator } from "./io/scan-generator.js";
export type { ScanGeneratorOptions } from "./io/scan-generator.js";
export { classifyFilename, detectCategory, detectPartNumber, isMaskFile } from "./normalize/classify-filename.js";
export { createPartKey, describePartKey, parsePartKeyId, partKeyId, partKeysEqual } from "./normalize/part-key.js";
export { defaultSelection, partFolderFor, relocatePart } from "./relocate/relocate-part.js";
export type { RelocatePartOptions } from "./relocate/relocate-part.js";
export { findManifests, readManifest, verifyManifest } from "./relocate/verify-manifest.js";
export type { ManifestVerification } from "./relocate/verify-manifest.js";
export {
  describePartStatus,
  hasAnyMain,
  hasAnyMask,
  isOrphanMaskOnly,
  maskStatus,
  summarizeIndex
} from "./review/part-status.js";
export type { MaskStatus, PartStatus } from "./review/part-status.js";
export {
  clampCursor,
  comparePartKeys,
  findPartKeyIndex,
  hasMissingMain,
  keyAt,
  queryPartKeys,
  sortPartKeys,
  stepCursor
} from "./review/query-view.js";
export type { PartQuery } from "./review/query-view.js";
export { ReviewSession, assertGeneratorRoot } from "./review/review-session.js";
export type { ReviewPosition, ReviewSessionOptions } from "./review/review-session.js";
export type * from "./types.js";
