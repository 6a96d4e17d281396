import { describe, expect, it } from "vitest";
import { ManifestRecordSchema } from "./manifest.js";

const key = { gender: "Kid", category: "Glasses", part_num: "07" };

describe("ManifestRecordSchema", () => {
  it("fills absent mask lists", () => {
    const parsed = ManifestRecordSchema.parse({
      mode: "move",
      key,
      selected: { ICON: { from: "/in/icon_Glasses_p07.png", to: "/out/ICON/icon_Glasses_p07.png" } },
      masks: {}
    });

    expect(parsed.masks).toEqual({ SV: [], TV: [], TVD: [] });
    expect(parsed.selected.ICON?.to).toBe("/out/ICON/icon_Glasses_p07.png");
  });

  it("rejects unknown roles and malformed keys", () => {
    expect(ManifestRecordSchema.safeParse({ mode: "copy", key, selected: { HAT: { from: "a", to: "b" } }, masks: {} }).success).toBe(
      false
    );
    expect(
      ManifestRecordSchema.safeParse({ mode: "copy", key: { ...key, part_num: "7" }, selected: {}, masks: {} }).success
    ).toBe(false);
    expect(ManifestRecordSchema.safeParse({ mode: "copy", key, selected: {}, masks: { ICON: [] } }).success).toBe(false);
  });
});
