import type { FrequencyTable } from "./types";

/**
 * Occurrence count per distinct symbol. Keys keep first-occurrence order,
 * which the tree builder relies on for reproducible tie-breaks.
 * Keys compare by SameValueZero, so -0 and 0 count as one symbol and
 * decode back as 0.
 */
export const countFrequencies = <S>(symbols: Iterable<S>): FrequencyTable<S> => {
  const counts: FrequencyTable<S> = new Map();
  for (const symbol of symbols) {
    counts.set(symbol, (counts.get(symbol) ?? 0) + 1);
  }
  return counts;
};
