import { readdir } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ScanError } from "../errors.js";
import { createGeneratorRoot, removeGeneratorRoot, writeAsset } from "../test-support/generator-tree.js";
import { scanGenerator } from "./scan-generator.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, readdir: vi.fn(actual.readdir) };
});

describe("scanGenerator read failures", () => {
  let root: string;

  beforeEach(async () => {
    root = await createGeneratorRoot();
  });

  afterEach(async () => {
    await removeGeneratorRoot(root);
  });

  it("fails the whole scan when a folder cannot be listed", async () => {
    await writeAsset(root, "Face", "Female", "FG_AccA_p01.png");
    const denied = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    vi.mocked(readdir).mockRejectedValueOnce(denied);

    const scan = scanGenerator({ root });

    await expect(scan).rejects.toBeInstanceOf(ScanError);
    await expect(scan).rejects.toMatchObject({
      path: path.join(root, "Face", "Female"),
      operation: "readdir",
      code: "SCAN_FAILED"
    });
  });
});
