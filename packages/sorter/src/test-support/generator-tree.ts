import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

export async function createGeneratorRoot(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "part-sorter-test-"));
}

export async function removeGeneratorRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

/** Writes `<root>/<folder>/<gender>/<fileName>`; contents default to the file name. */
export async function writeAsset(
  root: string,
  folder: string,
  gender: string,
  fileName: string,
  contents: string = fileName
): Promise<string> {
  const directory = path.join(root, folder, gender);
  await mkdir(directory, { recursive: true });
  const filePath = path.join(directory, fileName);
  await writeFile(filePath, contents);
  return filePath;
}

export async function listFilesRecursive(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files.sort();
}
