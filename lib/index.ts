export * from "./huffman";
export * from "./share";
export { CONFIG_DEFAULTS, loadConfig } from "./config";
export type { DeflateLevel, HuffpackConfig } from "./config";
export { buildSizeReport, formatSizeReport } from "./report/sizeReport";
export type { SizeReport } from "./report/sizeReport";
export { runCompress } from "./report/run";
export type { Logger, RunDeps } from "./report/run";
