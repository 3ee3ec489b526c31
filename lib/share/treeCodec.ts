import type { BitReader, BitWriter } from "../huffman/bitstream";
import { MalformedContainerError } from "../huffman/errors";
import { END_OF_INPUT, branch, symbolLeaf } from "../huffman/types";
import type { CodingTree } from "../huffman/types";

export const SYMBOL_BITS = 8;
// 257 leaves (every byte plus end-of-input) reach at most this depth
export const MAX_TREE_DEPTH = 256;

// Pre-order layout:
// branch: [0][left][right]
// leaf:   [1][kind:1] where kind 0 = end-of-input, 1 = symbol followed by [symbol:8]
export const writeTree = (w: BitWriter, tree: CodingTree<number>): void => {
  switch (tree.kind) {
    case "branch":
      w.writeBit(0);
      writeTree(w, tree.left);
      writeTree(w, tree.right);
      return;
    case "end":
      w.writeBit(1);
      w.writeBit(0);
      return;
    case "symbol":
      w.writeBit(1);
      w.writeBit(1);
      w.writeUnsigned(tree.symbol, SYMBOL_BITS);
      return;
  }
};

export const readTree = (r: BitReader): CodingTree<number> => {
  let endLeaves = 0;
  const seen = new Set<number>();

  const readNode = (depth: number): CodingTree<number> => {
    if (depth > MAX_TREE_DEPTH) {
      throw new MalformedContainerError("Tree too deep");
    }
    if (r.readBit() === 0) {
      const left = readNode(depth + 1);
      const right = readNode(depth + 1);
      return branch(left, right);
    }
    if (r.readBit() === 0) {
      endLeaves += 1;
      return END_OF_INPUT;
    }
    const symbol = r.readUnsigned(SYMBOL_BITS);
    if (seen.has(symbol)) {
      throw new MalformedContainerError(`Duplicate symbol in tree: ${symbol}`);
    }
    seen.add(symbol);
    return symbolLeaf(symbol);
  };

  const tree = readNode(0);
  if (endLeaves !== 1) {
    throw new MalformedContainerError(`Tree must hold exactly one end-of-input leaf, found ${endLeaves}`);
  }
  if (tree.kind !== "branch") {
    throw new MalformedContainerError("Tree must have at least two leaves");
  }
  return tree;
};
