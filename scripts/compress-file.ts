import { readFileSync } from "node:fs";
import { loadConfig } from "../lib/config";
import { runCompress } from "../lib/report/run";

try {
  runCompress(process.argv.slice(2), {
    readFile: (path) => new Uint8Array(readFileSync(path)),
    logger: console,
    config: loadConfig(),
  });
} catch (e) {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
}
