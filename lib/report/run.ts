import type { HuffpackConfig } from "../config";
import { decodeShareBytes } from "../share/decode";
import { encodeShareBytes } from "../share/encode";
import { buildSizeReport, formatSizeReport } from "./sizeReport";
import type { SizeReport } from "./sizeReport";

export type Logger = {
  log: (message: string) => void;
};

export type RunDeps = {
  readFile: (path: string) => Uint8Array;
  logger: Logger;
  config: HuffpackConfig;
};

const sameBytes = (a: Uint8Array, b: Uint8Array): boolean =>
  a.byteLength === b.byteLength && a.every((byte, i) => byte === b[i]);

/**
 * Encode the file named by the first argument into a container, check it
 * decodes back to the input, and log the size reduction.
 */
export const runCompress = (argv: readonly string[], { readFile, logger, config }: RunDeps): SizeReport => {
  const filePath = argv[0];
  if (!filePath) {
    throw new Error("Not enough command line arguments");
  }

  const content = readFile(filePath);
  const { packed, treeBits, payloadBits } = encodeShareBytes(content);

  if (config.verify && !sameBytes(decodeShareBytes(packed), content)) {
    throw new Error(`Round trip mismatch for ${filePath}`);
  }

  const report = buildSizeReport(content, packed, {
    deflateLevel: config.deflateLevel,
    payloadBits,
  });
  logger.log(`${filePath}: tree ${treeBits} bits, payload ${payloadBits} bits`);
  logger.log(formatSizeReport(report));
  return report;
};
