import { BitReader } from "./bitstream";
import { MalformedContainerError } from "./errors";
import type { CodingTree } from "./types";

/**
 * Walk the tree from the root once per symbol until the end-of-input leaf.
 * Padding after the end code is never read. Throws TruncatedStreamError
 * when the bits run out at a branch.
 */
export const readSymbols = <S>(tree: CodingTree<S>, r: BitReader): S[] => {
  if (tree.kind === "symbol") {
    throw new MalformedContainerError("Coding tree root must be a branch or the end-of-input leaf");
  }
  const out: S[] = [];
  let node: CodingTree<S> = tree;
  for (;;) {
    switch (node.kind) {
      case "end":
        return out;
      case "symbol":
        out.push(node.symbol);
        node = tree;
        break;
      case "branch":
        node = r.readBit() === 0 ? node.left : node.right;
        break;
    }
  }
};

export const decode = <S>(tree: CodingTree<S>, bytes: Uint8Array): S[] =>
  readSymbols(tree, new BitReader(bytes));
