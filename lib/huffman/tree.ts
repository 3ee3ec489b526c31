import { EmptyInputError, assertInvariant } from "./errors";
import { MinPriorityQueue } from "./priorityQueue";
import { END_OF_INPUT, branch, symbolLeaf } from "./types";
import type { CodingTree, FrequencyTable } from "./types";

type WeightedNode<S> = {
  frequency: number;
  order: number;
  node: CodingTree<S>;
};

/**
 * Greedy Huffman merge. The end-of-input leaf is seeded first with
 * frequency 0, then one leaf per symbol in table order. Equal frequencies
 * pop in insertion order and the first node popped becomes the left child.
 */
export const buildCodingTree = <S>(frequencies: FrequencyTable<S>): CodingTree<S> => {
  if (frequencies.size === 0) {
    throw new EmptyInputError();
  }

  const queue = new MinPriorityQueue<WeightedNode<S>>();
  let order = 0;
  queue.push({ frequency: 0, order: order++, node: END_OF_INPUT });
  for (const [symbol, frequency] of frequencies) {
    queue.push({ frequency, order: order++, node: symbolLeaf(symbol) });
  }

  while (queue.size > 1) {
    const a = queue.pop();
    const b = queue.pop();
    assertInvariant(a && b, "priority queue drained while merging");
    queue.push({
      frequency: a.frequency + b.frequency,
      order: order++,
      node: branch(a.node, b.node),
    });
  }

  const root = queue.pop();
  assertInvariant(root, "priority queue empty after merging");
  return root.node;
};

export const leafCount = <S>(tree: CodingTree<S>): number =>
  tree.kind === "branch" ? leafCount(tree.left) + leafCount(tree.right) : 1;

export const treeDepth = <S>(tree: CodingTree<S>): number =>
  tree.kind === "branch" ? 1 + Math.max(treeDepth(tree.left), treeDepth(tree.right)) : 0;

// Sum of frequency * depth over symbol leaves; the end leaf is counted once.
export const weightedPathLength = <S>(
  tree: CodingTree<S>,
  frequencies: FrequencyTable<S>,
): number => {
  const walk = (node: CodingTree<S>, depth: number): number => {
    switch (node.kind) {
      case "end":
        return depth;
      case "symbol":
        return depth * (frequencies.get(node.symbol) ?? 0);
      case "branch":
        return walk(node.left, depth + 1) + walk(node.right, depth + 1);
    }
  };
  return walk(tree, 0);
};
