import { chmod, copyFile, mkdir, rename, stat, unlink, utimes } from "node:fs/promises";
import type { TransferMode } from "@part-sorter/schema";
import { TransferError, errorCode } from "../errors.js";

export async function ensureDirectory(directoryPath: string, forSource: string): Promise<void> {
  try {
    await mkdir(directoryPath, { recursive: true });
  } catch (error) {
    throw new TransferError("mkdir", forSource, directoryPath, error);
  }
}

/**
 * Copy keeps mode and timestamps and leaves the source alone; move renames,
 * or copies then unlinks when source and destination sit on different devices.
 * An existing destination file is replaced.
 */
export async function transferFile(source: string, destination: string, mode: TransferMode): Promise<void> {
  try {
    if (mode === "copy") {
      await copyPreservingMetadata(source, destination);
      return;
    }
    await moveFile(source, destination);
  } catch (error) {
    throw new TransferError(mode, source, destination, error);
  }
}

async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    if (errorCode(error) !== "EXDEV") {
      throw error;
    }
    await copyPreservingMetadata(source, destination);
    await unlink(source);
  }
}

async function copyPreservingMetadata(source: string, destination: string): Promise<void> {
  const sourceStat = await stat(source);
  await copyFile(source, destination);
  await chmod(destination, sourceStat.mode & 0o7777);
  await utimes(destination, sourceStat.atime, sourceStat.mtime);
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await stat(targetPath);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}
