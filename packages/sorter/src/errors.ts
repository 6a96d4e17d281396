export type PartSorterErrorCode =
  | "INVALID_ROOT"
  | "SCAN_FAILED"
  | "TRANSFER_FAILED"
  | "DESTINATION_EXISTS"
  | "INVALID_SELECTION"
  | "INVALID_MANIFEST";

export class PartSorterError extends Error {
  constructor(
    message: string,
    public readonly code: PartSorterErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PartSorterError";
  }
}

export class InvalidRootError extends PartSorterError {
  constructor(public readonly root: string, reason: string) {
    super(`Invalid generator root (${reason}): ${root}`, "INVALID_ROOT");
    this.name = "InvalidRootError";
  }
}

/** A directory that exists could not be listed; the scan is abandoned. */
export class ScanError extends PartSorterError {
  constructor(
    public readonly path: string,
    public readonly operation: "stat" | "readdir",
    cause: unknown
  ) {
    super(`Scan failed during ${operation} of ${path}: ${describeCause(cause)}`, "SCAN_FAILED", { cause });
    this.name = "ScanError";
  }
}

export class TransferError extends PartSorterError {
  constructor(
    public readonly operation: "mkdir" | "copy" | "move",
    public readonly source: string,
    public readonly destination: string,
    cause: unknown
  ) {
    super(`Failed to ${operation} ${source} -> ${destination}: ${describeCause(cause)}`, "TRANSFER_FAILED", { cause });
    this.name = "TransferError";
  }
}

export class CollisionError extends PartSorterError {
  constructor(public readonly destinations: string[]) {
    super(
      `Destination already exists (${destinations.length}): ${destinations.join(", ")}`,
      "DESTINATION_EXISTS"
    );
    this.name = "CollisionError";
  }
}

export class SelectionError extends PartSorterError {
  constructor(message: string) {
    super(message, "INVALID_SELECTION");
    this.name = "SelectionError";
  }
}

export class ManifestFormatError extends PartSorterError {
  constructor(public readonly path: string, detail: string) {
    super(`Invalid manifest (${path}): ${detail}`, "INVALID_MANIFEST");
    this.name = "ManifestFormatError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}
