import { BitReader } from "../huffman/bitstream";
import { readSymbols } from "../huffman/decode";
import { MalformedContainerError } from "../huffman/errors";
import { fromBase64Url } from "../util/base64url";
import { CONTAINER_VERSION, HEADER_BYTES, MAGIC } from "./encode";
import { readTree } from "./treeCodec";

export const decodeShareBytes = (packed: Uint8Array): Uint8Array => {
  if (packed.byteLength < HEADER_BYTES) {
    throw new MalformedContainerError("Container too short");
  }
  const magic = String.fromCharCode(packed[0], packed[1]);
  const ver = (packed[2] >>> 4) & 0x0f;
  const flags = packed[2] & 0x0f;
  if (magic !== MAGIC) {
    throw new MalformedContainerError("Not a huffpack container");
  }
  if (ver !== CONTAINER_VERSION || flags !== 0) {
    throw new MalformedContainerError(`Unsupported container: version ${ver}, flags ${flags}`);
  }

  const r = new BitReader(packed.subarray(HEADER_BYTES));
  const tree = readTree(r);
  return Uint8Array.from(readSymbols(tree, r));
};

export const decodeShareText = (text: string): Uint8Array => {
  let bytes: Uint8Array;
  try { bytes = fromBase64Url(text); } catch { throw new MalformedContainerError("Invalid base64url text"); }
  return decodeShareBytes(bytes);
};
