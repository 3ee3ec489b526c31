import { describe, it, expect } from "vitest";
import { EmptyInputError } from "./errors";
import { countFrequencies } from "./frequency";
import { buildCodingTree, leafCount, treeDepth, weightedPathLength } from "./tree";
import { END_OF_INPUT, branch, symbolLeaf } from "./types";

describe("buildCodingTree", () => {
  it("merges end-of-input with the rarest symbol first", () => {
    const tree = buildCodingTree(countFrequencies([97, 97, 97, 98]));
    expect(tree).toEqual(branch(branch(END_OF_INPUT, symbolLeaf(98)), symbolLeaf(97)));
    expect(leafCount(tree)).toBe(3);
    expect(treeDepth(tree)).toBe(2);
  });

  it("builds a two-leaf tree for a single distinct symbol", () => {
    const tree = buildCodingTree(countFrequencies([7, 7, 7]));
    expect(tree).toEqual(branch(END_OF_INPUT, symbolLeaf(7)));
    expect(leafCount(tree)).toBe(2);
  });

  it("breaks frequency ties by insertion order, first popped on the left", () => {
    const tree = buildCodingTree(countFrequencies([1, 2]));
    expect(tree).toEqual(branch(symbolLeaf(2), branch(END_OF_INPUT, symbolLeaf(1))));
  });

  it("throws EmptyInputError for an empty table", () => {
    expect(() => buildCodingTree(new Map<number, number>())).toThrow(EmptyInputError);
  });
});

describe("weightedPathLength", () => {
  it("counts the end-of-input leaf once", () => {
    const frequencies = countFrequencies([97, 97, 97, 98]);
    const tree = buildCodingTree(frequencies);
    // 97: 3 * 1, 98: 1 * 2, end: 2
    expect(weightedPathLength(tree, frequencies)).toBe(7);
  });
});
