import { describe, it, expect } from "vitest";
import { decode } from "./decode";
import { encode } from "./encode";
import { MalformedContainerError, TruncatedStreamError } from "./errors";
import { END_OF_INPUT, symbolLeaf } from "./types";

const samples: number[][] = [
  [97, 97, 97, 98],
  [0],
  [255, 0, 255, 0, 1],
  Array.from({ length: 300 }, (_, i) => (i * 7) % 13),
  Array.from({ length: 256 }, (_, i) => i),
];

describe("decode", () => {
  it("decodes aaab", () => {
    const { tree } = encode([97, 97, 97, 98]);
    expect(decode(tree, Uint8Array.from([0xe8]))).toEqual([97, 97, 97, 98]);
  });

  it("round-trips byte sequences", () => {
    for (const input of samples) {
      const { tree, bytes } = encode(input);
      expect(decode(tree, bytes)).toEqual(input);
    }
  });

  it("round-trips string symbols", () => {
    const input = "hello, huffman".split("");
    const { tree, bytes } = encode(input);
    expect(decode(tree, bytes).join("")).toBe("hello, huffman");
  });

  it("treats -0 and 0 as the same symbol", () => {
    const { tree, bytes } = encode([-0, 1, 0]);
    const out = decode(tree, bytes);
    expect(out).toEqual([0, 1, 0]);
    expect(Object.is(out[0], 0)).toBe(true);
  });

  it("ignores bytes after the end-of-input code", () => {
    const { tree, bytes } = encode([97, 97, 97, 98]);
    const padded = Uint8Array.from([...bytes, 0xff, 0x00]);
    expect(decode(tree, padded)).toEqual([97, 97, 97, 98]);
  });

  it("never decodes a truncated stream as success", () => {
    for (const input of samples) {
      const { tree, bytes } = encode(input);
      expect(() => decode(tree, bytes.subarray(0, bytes.length - 1))).toThrow(TruncatedStreamError);
    }
  });

  it("returns nothing for a tree that is only the end leaf", () => {
    expect(decode(END_OF_INPUT, new Uint8Array())).toEqual([]);
  });

  it("rejects a tree whose root is a symbol", () => {
    expect(() => decode(symbolLeaf(1), Uint8Array.from([0]))).toThrow(MalformedContainerError);
    expect(() => decode(symbolLeaf(1), Uint8Array.from([0]))).toThrow("root must be a branch");
  });
});
