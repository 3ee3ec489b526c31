export { BitReader, BitWriter } from "./bitstream";
export { deriveCodeTable, formatCode } from "./codeTable";
export { decode, readSymbols } from "./decode";
export { encode, writeSymbols } from "./encode";
export {
  EmptyInputError,
  HuffmanError,
  MalformedContainerError,
  TruncatedStreamError,
  assertInvariant,
} from "./errors";
export { countFrequencies } from "./frequency";
export { MinPriorityQueue } from "./priorityQueue";
export { buildCodingTree, leafCount, treeDepth, weightedPathLength } from "./tree";
export { END_OF_INPUT, branch, symbolLeaf } from "./types";
export type {
  Bit,
  Branch,
  CodeTable,
  CodingTree,
  EncodeResult,
  EndOfInputLeaf,
  FrequencyTable,
  SymbolLeaf,
} from "./types";
