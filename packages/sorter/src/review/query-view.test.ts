import { describe, expect, it } from "vitest";
import type { PartKey } from "@part-sorter/schema";
import { createEmptyGroup } from "../io/scan-generator.js";
import { createPartKey, partKeyId } from "../normalize/part-key.js";
import type { GroupIndex, PartGroup } from "../types.js";
import {
  clampCursor,
  findPartKeyIndex,
  hasMissingMain,
  keyAt,
  matchesFilterText,
  queryPartKeys,
  sortPartKeys,
  stepCursor
} from "./query-view.js";

function groupFor(id: string, fill: (group: PartGroup) => void = () => {}): PartGroup {
  const [gender, category, part] = id.split("/");
  const group = createEmptyGroup(createPartKey({ gender, category, partNum: part.slice(1) }));
  fill(group);
  return group;
}

function file(name: string) {
  return { path: `/generator/${name}`, fileName: name };
}

function buildIndex(groups: PartGroup[]): GroupIndex {
  return new Map(groups.map((group): [string, PartGroup] => [partKeyId(group.key), group]));
}

const complete = (group: PartGroup) => {
  group.candidates.FACE.push(file("FG.png"));
  group.candidates.SV.push(file("SV.png"));
  group.candidates.TV.push(file("TV.png"));
  group.candidates.TVD.push(file("TVD.png"));
  group.candidates.ICON.push(file("icon.png"));
};

const index = buildIndex([
  groupFor("Male/Eyes/p10", (group) => group.candidates.SV.push(file("SV_Eyes_p10.png"))),
  groupFor("Male/Eyes/p02", (group) => group.candidates.SV.push(file("SV_Eyes_p02.png"))),
  groupFor("Female/Clothing/p01", complete),
  groupFor("Female/AccA/p02", (group) => group.masks.TV.push(file("TV_AccA_p02_c.png"))),
  groupFor("Kid/Face/p01", (group) => group.candidates.FACE.push(file("FG_Face_p01.png")))
]);

const ids = (keys: PartKey[]) => keys.map(partKeyId);

describe("queryPartKeys", () => {
  it("orders by gender, category and numeric part", () => {
    expect(ids(queryPartKeys(index))).toEqual([
      "Female/AccA/p02",
      "Female/Clothing/p01",
      "Kid/Face/p01",
      "Male/Eyes/p02",
      "Male/Eyes/p10"
    ]);
  });

  it("filters on part number with and without the p prefix", () => {
    expect(ids(queryPartKeys(index, { filterText: "p1" }))).toEqual(["Male/Eyes/p10"]);
    expect(ids(queryPartKeys(index, { filterText: "01" }))).toEqual(["Female/Clothing/p01", "Kid/Face/p01"]);
  });

  it("filters on gender and category, ignoring case and padding", () => {
    expect(ids(queryPartKeys(index, { filterText: "  EYES " }))).toEqual(["Male/Eyes/p02", "Male/Eyes/p10"]);
    expect(ids(queryPartKeys(index, { filterText: "kid" }))).toEqual(["Kid/Face/p01"]);
  });

  it("keeps only parts missing a main role", () => {
    expect(ids(queryPartKeys(index, { missingOnly: true }))).toEqual([
      "Female/AccA/p02",
      "Kid/Face/p01",
      "Male/Eyes/p02",
      "Male/Eyes/p10"
    ]);
  });

  it("combines both filters", () => {
    expect(ids(queryPartKeys(index, { filterText: "female", missingOnly: true }))).toEqual(["Female/AccA/p02"]);
  });

  it("returns nothing for an empty index", () => {
    expect(queryPartKeys(new Map(), { filterText: "x" })).toEqual([]);
  });
});

describe("helpers", () => {
  it("sorts numerically rather than lexically", () => {
    const keys = ["Male/Eyes/p10", "Male/Eyes/p02", "Male/Eyes/p100"].map((id) => groupFor(id).key);
    expect(ids(sortPartKeys(keys))).toEqual(["Male/Eyes/p02", "Male/Eyes/p10", "Male/Eyes/p100"]);
  });

  it("matches an empty filter", () => {
    expect(matchesFilterText(groupFor("Kid/Face/p01").key, "  ")).toBe(true);
  });

  it("detects a missing main role", () => {
    expect(hasMissingMain(groupFor("Kid/Face/p01", complete))).toBe(false);
    expect(hasMissingMain(groupFor("Kid/Face/p01"))).toBe(true);
  });
});

describe("cursor", () => {
  it("clamps into range", () => {
    expect(clampCursor(5, 3)).toBe(2);
    expect(clampCursor(-1, 3)).toBe(0);
    expect(clampCursor(2, 0)).toBe(0);
    expect(stepCursor(0, -1, 3)).toBe(0);
    expect(stepCursor(1, 1, 3)).toBe(2);
    expect(stepCursor(2, 1, 3)).toBe(2);
  });

  it("reports no current key for an empty view", () => {
    expect(keyAt([], 0)).toBeNull();
  });

  it("finds keys by identity", () => {
    const keys = queryPartKeys(index);
    const lookup = createPartKey({ gender: "Kid", category: "Face", partNum: "01" });
    expect(findPartKeyIndex(keys, lookup)).toBe(2);
    expect(findPartKeyIndex(keys, createPartKey({ gender: "Kid", category: "Face", partNum: "02" }))).toBe(-1);
  });
});
