import { assertInvariant } from "./errors";
import type { Bit, CodeTable, CodingTree } from "./types";

export const deriveCodeTable = <S>(tree: CodingTree<S>): CodeTable<S> => {
  const symbols = new Map<S, Bit[]>();
  let endOfInput: Bit[] | undefined;

  const stack: Array<[CodingTree<S>, Bit[]]> = [[tree, []]];
  while (stack.length) {
    const entry = stack.pop();
    if (!entry) break;
    const [node, path] = entry;
    switch (node.kind) {
      case "end":
        endOfInput = path;
        break;
      case "symbol":
        symbols.set(node.symbol, path);
        break;
      case "branch":
        // right pushed first so the left subtree is visited first
        stack.push([node.right, [...path, 1]]);
        stack.push([node.left, [...path, 0]]);
        break;
    }
  }

  assertInvariant(endOfInput, "coding tree has no end-of-input leaf");
  return { symbols, endOfInput };
};

export const formatCode = (bits: readonly Bit[]): string => bits.join("");
