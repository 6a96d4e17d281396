import { stat } from "node:fs/promises";
import path from "node:path";
import type { CollisionPolicy, PartKey, TransferMode } from "@part-sorter/schema";
import { InvalidRootError, ScanError, errorCode } from "../errors.js";
import { scanGenerator } from "../io/scan-generator.js";
import { partKeyId } from "../normalize/part-key.js";
import { relocatePart } from "../relocate/relocate-part.js";
import type { GroupIndex, PartGroup, ProgressReporter, RelocationOutcome, Selection } from "../types.js";
import { clampCursor, findPartKeyIndex, keyAt, queryPartKeys, stepCursor } from "./query-view.js";

export interface ReviewSessionOptions {
  collisionPolicy?: CollisionPolicy;
  onProgress?: ProgressReporter;
}

export interface ReviewPosition {
  key: PartKey;
  group: PartGroup;
  /** Zero-based cursor into the filtered keys. */
  position: number;
  total: number;
}

/**
 * Caller-side review state over one generator root: the live index, the
 * filtered key order, the cursor and the parts marked OK. The index is only
 * ever replaced by a fresh scan.
 */
export class ReviewSession {
  private index: GroupIndex = new Map();
  private keys: PartKey[] = [];
  private cursor = 0;
  private filterText = "";
  private missingOnly = false;
  private readonly reviewed = new Set<string>();

  private constructor(
    readonly root: string,
    private readonly options: ReviewSessionOptions
  ) {}

  static async open(root: string, options: ReviewSessionOptions = {}): Promise<ReviewSession> {
    await assertGeneratorRoot(root);
    const session = new ReviewSession(path.resolve(root), options);
    await session.rescan();
    return session;
  }

  get groupIndex(): GroupIndex {
    return this.index;
  }

  get visibleKeys(): readonly PartKey[] {
    return this.keys;
  }

  get filters(): { filterText: string; missingOnly: boolean } {
    return { filterText: this.filterText, missingOnly: this.missingOnly };
  }

  /** Rebuilds the index from disk and re-applies the current filters. */
  async rescan(): Promise<void> {
    this.index = await scanGenerator({ root: this.root, onProgress: this.options.onProgress });
    this.reviewed.clear();
    this.applyFilters();
  }

  setFilter(filterText: string): void {
    this.filterText = filterText;
    this.applyFilters();
  }

  setMissingOnly(missingOnly: boolean): void {
    this.missingOnly = missingOnly;
    this.applyFilters();
  }

  current(): ReviewPosition | null {
    const key = keyAt(this.keys, this.cursor);
    if (!key) {
      return null;
    }
    const group = this.index.get(partKeyId(key));
    if (!group) {
      return null;
    }
    return { key, group, position: this.cursor, total: this.keys.length };
  }

  next(): ReviewPosition | null {
    this.cursor = stepCursor(this.cursor, 1, this.keys.length);
    return this.current();
  }

  prev(): ReviewPosition | null {
    this.cursor = stepCursor(this.cursor, -1, this.keys.length);
    return this.current();
  }

  /** Moves the cursor to `key`; when it is not visible the cursor only gets clamped. */
  jumpTo(key: PartKey): boolean {
    const found = findPartKeyIndex(this.keys, key);
    if (found >= 0) {
      this.cursor = found;
      return true;
    }
    this.cursor = clampCursor(this.cursor, this.keys.length);
    return false;
  }

  isReviewed(key: PartKey): boolean {
    return this.reviewed.has(partKeyId(key));
  }

  markReviewed(): void {
    const current = this.current();
    if (!current) {
      return;
    }
    this.reviewed.add(partKeyId(current.key));
    this.cursor = stepCursor(this.cursor, 1, this.keys.length);
  }

  /**
   * Relocates the part under the cursor. A copy marks it reviewed and
   * advances. A move rescans, keeps the filters and lands on the part that
   * followed it before the move; when that part is gone the cursor stays at
   * its old position, clamped, rather than returning to the first part.
   * A move that fails partway still rescans before the error propagates, and
   * the cursor goes back to the part it was on.
   */
  async relocateCurrent(selection: Selection, mode: TransferMode): Promise<RelocationOutcome | null> {
    const current = this.current();
    if (!current) {
      return null;
    }

    const previousCursor = this.cursor;
    const followingKey = this.cursor < this.keys.length - 1 ? keyAt(this.keys, this.cursor + 1) : null;

    let outcome: RelocationOutcome;
    try {
      outcome = await relocatePart({
        root: this.root,
        group: current.group,
        selection,
        mode,
        collisionPolicy: this.options.collisionPolicy,
        onProgress: this.options.onProgress
      });
    } catch (error) {
      if (mode === "move") {
        await this.rescan();
        this.cursor = previousCursor;
        this.jumpTo(current.key);
      }
      throw error;
    }
    if (outcome.kind === "nothing_to_transfer") {
      return outcome;
    }

    if (mode === "copy") {
      this.markReviewed();
      return outcome;
    }

    await this.rescan();
    this.cursor = previousCursor;
    if (!followingKey || !this.jumpTo(followingKey)) {
      this.cursor = clampCursor(previousCursor, this.keys.length);
    }
    return outcome;
  }

  private applyFilters(): void {
    this.keys = queryPartKeys(this.index, { filterText: this.filterText, missingOnly: this.missingOnly });
    this.cursor = 0;
  }
}

export async function assertGeneratorRoot(root: string): Promise<void> {
  if (!root.trim()) {
    throw new InvalidRootError(root, "empty path");
  }

  const rootStat = await stat(root).catch((error: unknown) => {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new InvalidRootError(root, "does not exist");
    }
    throw new ScanError(root, "stat", error);
  });

  if (!rootStat.isDirectory()) {
    throw new InvalidRootError(root, "not a directory");
  }
}
