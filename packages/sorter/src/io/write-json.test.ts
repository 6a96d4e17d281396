import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createGeneratorRoot, removeGeneratorRoot } from "../test-support/generator-tree.js";
import { writeJsonFile } from "./write-json.js";

describe("writeJsonFile", () => {
  let root: string;

  beforeEach(async () => {
    root = await createGeneratorRoot();
  });

  afterEach(async () => {
    await removeGeneratorRoot(root);
  });

  it("writes indented JSON with a trailing newline and no temp file", async () => {
    const outputPath = path.join(root, "nested", "record.json");

    await writeJsonFile(outputPath, { mode: "copy" });

    expect(await readFile(outputPath, "utf8")).toBe('{\n  "mode": "copy"\n}\n');
    expect(await readdir(path.dirname(outputPath))).toEqual(["record.json"]);
  });

  it("removes the temp file when the final rename fails", async () => {
    const outputPath = path.join(root, "record.json");
    await mkdir(outputPath);
    await writeFile(path.join(outputPath, "keep.txt"), "x");

    await expect(writeJsonFile(outputPath, { mode: "move" })).rejects.toThrow();

    expect(await readdir(root)).toEqual(["record.json"]);
  });
});
