export { decodeShareBytes, decodeShareText } from "./decode";
export { CONTAINER_VERSION, HEADER_BYTES, MAGIC, encodeShareBytes, encodeShareText } from "./encode";
export type { ShareEncodingResult } from "./encode";
export { readTree, writeTree } from "./treeCodec";
