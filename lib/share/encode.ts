import { BitWriter } from "../huffman/bitstream";
import { deriveCodeTable } from "../huffman/codeTable";
import { writeSymbols } from "../huffman/encode";
import { countFrequencies } from "../huffman/frequency";
import { buildCodingTree } from "../huffman/tree";
import type { CodingTree } from "../huffman/types";
import { toBase64Url } from "../util/base64url";
import { writeTree } from "./treeCodec";

export const MAGIC = "HF";
export const CONTAINER_VERSION = 1;
export const HEADER_BYTES = 3;

export type ShareEncodingResult = {
  packed: Uint8Array;
  tree: CodingTree<number>;
  treeBits: number;
  payloadBits: number;
};

export const encodeShareBytes = (bytes: Uint8Array): ShareEncodingResult => {
  const tree = buildCodingTree(countFrequencies(bytes));
  const table = deriveCodeTable(tree);

  const w = new BitWriter();
  // Envelope v1: ['H','F', (ver<<4)|(flags4)]; flags reserved, always 0
  w.writeUnsigned(MAGIC.charCodeAt(0), 8);
  w.writeUnsigned(MAGIC.charCodeAt(1), 8);
  w.writeUnsigned(CONTAINER_VERSION, 4);
  w.writeUnsigned(0, 4);

  const treeStart = w.bitLength;
  writeTree(w, tree);
  const payloadStart = w.bitLength;
  writeSymbols(w, table, bytes);
  const payloadBits = w.bitLength - payloadStart;

  return {
    packed: w.toUint8Array(),
    tree,
    treeBits: payloadStart - treeStart,
    payloadBits,
  };
};

export const encodeShareText = (bytes: Uint8Array): string =>
  toBase64Url(encodeShareBytes(bytes).packed);
