/**
 * Tests for bucketed CSV export
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { BOM } from "../src/core/csv";
import {
  classifyItem,
  createItemRecord,
  determineArchetype,
  resolveBucket,
} from "../src/item/classifier";
import {
  ExportError,
  appendItem,
  createBucketResolver,
  exportItems,
  readBucketFile,
} from "../src/item/exporter";
import { ARCHETYPE_FIELDS } from "../src/item/types";

const WEAPON_HEADER = ARCHETYPE_FIELDS.weapon.join(",");
const EQUIPMENT_HEADER = ARCHETYPE_FIELDS.equipment.join(",");

function readLines(filePath: string): string[] {
  return readFileSync(filePath, "utf-8").split("\n");
}

describe("exportItems", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), "item-export-"));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it("writes one file per bucket with a header and one row per item", () => {
    const items = [
      classifyItem("Rusty Short Sword", { Type: "1H Slashing", Damage: "7" }),
      classifyItem("Cloth Cap", { Slot: "Head", AC: "5" }),
      classifyItem("Rusty Long Sword", { Type: "1H Slashing", Damage: "9" }),
    ];

    const written = exportItems(items, createBucketResolver(outputDir));

    const slashing = join(outputDir, "weapons", "Slashing.csv");
    const head = join(outputDir, "equipment", "Head.csv");
    expect(written).toEqual([
      { archetype: "weapon", bucket: "Slashing", filePath: slashing, count: 2 },
      { archetype: "equipment", bucket: "Head", filePath: head, count: 1 },
    ]);
    expect(readLines(slashing)).toEqual([
      BOM + WEAPON_HEADER,
      "Rusty Short Sword,1H Slashing,7" + ",".repeat(14),
      "Rusty Long Sword,1H Slashing,9" + ",".repeat(14),
      "",
    ]);
    expect(readLines(head)).toEqual([
      BOM + EQUIPMENT_HEADER,
      "Cloth Cap,,Head,5" + ",".repeat(12),
      "",
    ]);
  });

  it("routes every input item to exactly one row", () => {
    const items = [
      classifyItem("Spear", { Type: "2H Piercing" }),
      classifyItem("Longbow", { Type: "Archery Bow" }),
      classifyItem("Cloak", { Slot: "Back" }),
      classifyItem("Ring", { Slot: "Fingers" }),
      classifyItem("Bauble", {}),
      classifyItem("Trinket", { Slot: "Charm" }),
    ];

    const written = exportItems(items, createBucketResolver(outputDir));

    expect(written.map((f) => f.bucket).sort()).toEqual(
      ["Back", "Bows", "Fingers", "Piercing", "misc"].sort()
    );
    expect(written.reduce((sum, f) => sum + f.count, 0)).toBe(items.length);
    for (const file of written) {
      // header + rows + trailing newline
      expect(readLines(file.filePath)).toHaveLength(file.count + 2);
    }
  });

  it("replaces rows from a previous export instead of appending", () => {
    const resolve = createBucketResolver(outputDir);
    exportItems([classifyItem("Old Cap", { Slot: "Head" })], resolve);

    exportItems([classifyItem("New Cap", { Slot: "Head" })], resolve);

    const lines = readLines(join(outputDir, "equipment", "Head.csv"));
    expect(lines).toHaveLength(3);
    expect(lines[1].startsWith("New Cap,")).toBe(true);
  });

  it("writes nothing for an empty batch", () => {
    expect(exportItems([], createBucketResolver(outputDir))).toEqual([]);
    expect(existsSync(join(outputDir, "weapons"))).toBe(false);
    expect(existsSync(join(outputDir, "equipment"))).toBe(false);
  });

  it("refuses to mix archetypes in one file", () => {
    const filePath = join(outputDir, "all.csv");
    const items = [
      classifyItem("Sword", { Type: "1H Slashing" }),
      classifyItem("Cap", { Slot: "Head" }),
    ];

    expect(() =>
      exportItems(items, (item) => ({ archetype: item.archetype, bucket: "all", filePath }))
    ).toThrow(ExportError);
  });

  it("round-trips values through the written file", () => {
    const original = classifyItem('Cloak of "Shadows", Lesser', {
      Slot: "Back",
      AC: "4",
      Stats: "STR: +5, DEX: +2\nSave vs Magic: +5",
      Effect: 'See "Invisibility"',
      Extra: "not in schema",
    });

    const [file] = exportItems([original], createBucketResolver(outputDir));
    const [restored] = readBucketFile(file.filePath, "equipment");

    expect(restored.archetype).toBe("equipment");
    expect(restored.name).toBe(original.name);
    for (const field of ARCHETYPE_FIELDS.equipment.slice(1)) {
      expect(restored.attributes[field]).toBe(original.attributes[field] ?? "");
    }
    expect(restored.attributes.Extra).toBeUndefined();
  });

  it("keeps a lower-case Type label in the bucket its value selects", () => {
    const club = classifyItem("Club", { type: "2H Blunt", Damage: "9" });

    const [file] = exportItems([club], createBucketResolver(outputDir));
    expect(file.filePath).toBe(join(outputDir, "weapons", "Blunt.csv"));

    const [restored] = readBucketFile(file.filePath, "weapon");
    expect(restored.attributes.Type).toBe("2H Blunt");
    expect(restored.attributes.Damage).toBe("9");
    expect(determineArchetype(restored.attributes)).toBe("weapon");
    expect(resolveBucket(restored)).toBe("Blunt");
  });
});

describe("appendItem", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), "item-append-"));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it("writes the header only once", () => {
    const filePath = join(outputDir, "weapons", "Blunt.csv");

    appendItem(createItemRecord("weapon", "Club", { Type: "1H Blunt", Damage: "5" }), filePath);
    appendItem(createItemRecord("weapon", "Mace", { Type: "1H Blunt", Damage: "8" }), filePath);

    expect(readLines(filePath)).toEqual([
      BOM + WEAPON_HEADER,
      "Club,1H Blunt,5" + ",".repeat(14),
      "Mace,1H Blunt,8" + ",".repeat(14),
      "",
    ]);
  });

  it("adds a header to an existing empty file", () => {
    const filePath = join(outputDir, "Head.csv");
    writeFileSync(filePath, "");

    appendItem(createItemRecord("equipment", "Cap", { Slot: "Head" }), filePath);

    expect(readLines(filePath)[0]).toBe(BOM + EQUIPMENT_HEADER);
  });

  it("produces a file readBucketFile understands", () => {
    const filePath = join(outputDir, "Neck.csv");
    appendItem(createItemRecord("equipment", "Amulet", { Slot: "Neck", AC: "1" }), filePath);

    const [item] = readBucketFile(filePath, "equipment");

    expect(item.name).toBe("Amulet");
    expect(item.attributes.AC).toBe("1");
    expect(item.attributes.Type).toBe("");
  });
});
