import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ManifestFormatError } from "../errors.js";
import { scanGenerator } from "../io/scan-generator.js";
import { createGeneratorRoot, removeGeneratorRoot, writeAsset } from "../test-support/generator-tree.js";
import type { PartGroup } from "../types.js";
import { relocatePart } from "./relocate-part.js";
import { findManifests, listTransfers, readManifest, verifyManifest } from "./verify-manifest.js";

describe("manifest verification", () => {
  let root: string;
  let group: PartGroup;

  beforeEach(async () => {
    root = await createGeneratorRoot();
    await writeAsset(root, "SV", "Male", "SV_Beard_p02.png");
    await writeAsset(root, "SV", "Male", "SV_Beard_p02_c.png");
    const found = (await scanGenerator({ root })).get("Male/Beard/p02");
    if (!found) {
      throw new Error("fixture part not scanned");
    }
    group = found;
  });

  afterEach(async () => {
    await removeGeneratorRoot(root);
  });

  it("finds nothing before anything was sorted", async () => {
    expect(await findManifests(root)).toEqual([]);
  });

  it("accepts a record that matches the disk", async () => {
    const outcome = await relocatePart({ root, group, selection: { SV: group.candidates.SV[0] }, mode: "move" });
    if (outcome.kind !== "relocated") {
      throw new Error("expected a relocation");
    }

    expect(await findManifests(root)).toEqual([outcome.manifestPath]);
    const result = await verifyManifest(outcome.manifestPath);
    expect(result.ok).toBe(true);
    expect(listTransfers(result.manifest)).toHaveLength(2);
  });

  it("reports missing destinations and lingering sources", async () => {
    const outcome = await relocatePart({ root, group, selection: { SV: group.candidates.SV[0] }, mode: "move" });
    if (outcome.kind !== "relocated") {
      throw new Error("expected a relocation");
    }
    const mainTransfer = outcome.manifest.selected.SV;
    if (!mainTransfer) {
      throw new Error("expected an SV transfer");
    }
    await rm(mainTransfer.to);
    await writeAsset(root, "SV", "Male", "SV_Beard_p02_c.png");

    const result = await verifyManifest(outcome.manifestPath);

    expect(result.ok).toBe(false);
    expect(result.missingDestinations).toEqual([mainTransfer.to]);
    expect(result.lingeringSources).toEqual([path.join(root, "SV", "Male", "SV_Beard_p02_c.png")]);
  });

  it("does not expect copied sources to be gone", async () => {
    const outcome = await relocatePart({ root, group, selection: { SV: group.candidates.SV[0] }, mode: "copy" });
    if (outcome.kind !== "relocated") {
      throw new Error("expected a relocation");
    }

    const result = await verifyManifest(outcome.manifestPath);

    expect(result.lingeringSources).toEqual([]);
    expect(result.ok).toBe(true);
  });

  it("rejects records that do not match the schema", async () => {
    const folder = path.join(root, "Sort", "Male", "Beard_p02");
    await mkdir(folder, { recursive: true });
    const broken = path.join(folder, "manifest.json");
    await writeFile(broken, JSON.stringify({ mode: "rename", key: {}, selected: {}, masks: {} }));
    const garbled = path.join(folder, "copy_log.json");
    await writeFile(garbled, "{ not json");

    expect(await findManifests(root)).toEqual([broken, garbled]);
    await expect(readManifest(broken)).rejects.toBeInstanceOf(ManifestFormatError);
    await expect(readManifest(garbled)).rejects.toBeInstanceOf(ManifestFormatError);
  });
});
