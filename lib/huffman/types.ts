export type Bit = 0 | 1;

export type EndOfInputLeaf = { readonly kind: "end" };

export type SymbolLeaf<S> = { readonly kind: "symbol"; readonly symbol: S };

export type Branch<S> = {
  readonly kind: "branch";
  readonly left: CodingTree<S>;
  readonly right: CodingTree<S>;
};

/**
 * Decode key shared by the encoder and decoder. Root-to-leaf paths are the
 * codes: left is 0, right is 1.
 */
export type CodingTree<S> = EndOfInputLeaf | SymbolLeaf<S> | Branch<S>;

export type FrequencyTable<S> = Map<S, number>;

export type CodeTable<S> = {
  symbols: Map<S, Bit[]>;
  endOfInput: Bit[];
};

export type EncodeResult<S> = {
  tree: CodingTree<S>;
  bytes: Uint8Array;
  // Payload bits before zero padding
  bitLength: number;
};

export const END_OF_INPUT: EndOfInputLeaf = Object.freeze({ kind: "end" });

export const symbolLeaf = <S>(symbol: S): SymbolLeaf<S> => ({ kind: "symbol", symbol });

export const branch = <S>(left: CodingTree<S>, right: CodingTree<S>): Branch<S> => ({
  kind: "branch",
  left,
  right,
});
