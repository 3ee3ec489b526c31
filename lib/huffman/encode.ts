import { BitWriter } from "./bitstream";
import { deriveCodeTable } from "./codeTable";
import { assertInvariant } from "./errors";
import { countFrequencies } from "./frequency";
import { buildCodingTree } from "./tree";
import type { CodeTable, EncodeResult } from "./types";

/**
 * Append every symbol's code, then the end-of-input code. Callers that
 * share a writer (the container format) use this directly.
 */
export const writeSymbols = <S>(
  w: BitWriter,
  table: CodeTable<S>,
  symbols: Iterable<S>,
): void => {
  for (const symbol of symbols) {
    const code = table.symbols.get(symbol);
    assertInvariant(code, `symbol ${String(symbol)} missing from the code table`);
    w.writeBits(code);
  }
  w.writeBits(table.endOfInput);
};

export const encode = <S>(symbols: readonly S[]): EncodeResult<S> => {
  const tree = buildCodingTree(countFrequencies(symbols));
  const table = deriveCodeTable(tree);

  const w = new BitWriter();
  writeSymbols(w, table, symbols);
  const bitLength = w.bitLength;
  return { tree, bytes: w.toUint8Array(), bitLength };
};
