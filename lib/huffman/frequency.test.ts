import { describe, it, expect } from "vitest";
import { countFrequencies } from "./frequency";

describe("countFrequencies", () => {
  it("counts each distinct byte", () => {
    const table = countFrequencies([97, 97, 97, 98]);
    expect(Array.from(table)).toEqual([
      [97, 3],
      [98, 1],
    ]);
  });

  it("keeps first-occurrence order", () => {
    const table = countFrequencies("banana".split(""));
    expect(Array.from(table.keys())).toEqual(["b", "a", "n"]);
    expect(table.get("a")).toBe(3);
    expect(table.get("n")).toBe(2);
  });

  it("returns an empty table for empty input", () => {
    expect(countFrequencies([]).size).toBe(0);
  });
});
