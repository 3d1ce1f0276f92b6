import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { LocalityTable, UNKNOWN_LOCALITY, loadLocalityTable } from "./locality-table.js";

describe("LocalityTable", () => {
  it("prefers the longest matching prefix", () => {
    const table = new LocalityTable({ "48": "Lipetsk", "481": "Michurinsk" });
    expect(table.resolve("4815001")).toBe("Michurinsk");
    expect(table.resolve("4820001")).toBe("Lipetsk");
  });

  it("returns the unknown marker when no prefix matches", () => {
    const table = new LocalityTable({ "77": "Moscow" });
    expect(table.resolve("9900001")).toBe(UNKNOWN_LOCALITY);
    expect(table.resolve("")).toBe("Undefined");
  });
});

describe("loadLocalityTable", () => {
  it("loads the bundled table", () => {
    const table = loadLocalityTable();
    expect(table.size).toBe(42);
    expect(table.resolve("7700123")).toBe("Москва");
    expect(table.resolve("4810123")).toBe("Мичуринск");
    expect(table.resolve("4870123")).toBe("Липецк");
    expect(table.resolve("1610123")).toBe("Набережные Челны");
  });

  it("rejects a table with non-numeric prefixes", () => {
    const path = join(mkdtempSync(join(tmpdir(), "netprobe-localities-")), "localities.json");
    writeFileSync(path, JSON.stringify({ ab: "Nowhere" }));
    expect(() => loadLocalityTable(path)).toThrow(/^Invalid locality table in /);
  });
});
