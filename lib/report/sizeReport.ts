import { deflate } from "pako";
import type { DeflateLevel } from "../config";

export type SizeReport = {
  originalBytes: number;
  encodedBytes: number;
  percent: number;
  // Huffman payload alone, without header and tree
  payloadBytes?: number;
  deflateBytes?: number;
};

const percentOf = (part: number, whole: number): number =>
  whole === 0 ? 0 : (100 * part) / whole;

export const buildSizeReport = (
  original: Uint8Array,
  encoded: Uint8Array,
  { deflateLevel = null, payloadBits }: { deflateLevel?: DeflateLevel | null; payloadBits?: number } = {},
): SizeReport => {
  const report: SizeReport = {
    originalBytes: original.byteLength,
    encodedBytes: encoded.byteLength,
    percent: percentOf(encoded.byteLength, original.byteLength),
  };
  if (payloadBits !== undefined) {
    report.payloadBytes = Math.ceil(payloadBits / 8);
  }
  if (deflateLevel !== null) {
    report.deflateBytes = deflate(original, { level: deflateLevel }).byteLength;
  }
  return report;
};

export const formatSizeReport = (report: SizeReport): string => {
  const lines = [
    `Size reduction: ${report.originalBytes} => ${report.encodedBytes} (${report.percent.toFixed(2)}%)`,
  ];
  if (report.payloadBytes !== undefined) {
    const p = percentOf(report.payloadBytes, report.originalBytes);
    lines.push(`Payload only: ${report.payloadBytes} (${p.toFixed(2)}%)`);
  }
  if (report.deflateBytes !== undefined) {
    const p = percentOf(report.deflateBytes, report.originalBytes);
    lines.push(`Deflate baseline: ${report.deflateBytes} (${p.toFixed(2)}%)`);
  }
  return lines.join("\n");
};
