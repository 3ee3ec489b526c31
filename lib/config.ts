export type HuffpackConfig = {
  // pako level for the deflate baseline; null when the baseline is off
  deflateLevel: DeflateLevel | null;
  verify: boolean;
};

export type DeflateLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const DEFLATE_LEVELS: readonly DeflateLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

export const CONFIG_DEFAULTS: HuffpackConfig = {
  deflateLevel: 9,
  verify: true,
};

type Env = Record<string, string | undefined>;

const parseDeflateLevel = (raw: string | undefined): DeflateLevel | null => {
  const value = raw?.trim();
  if (!value) return CONFIG_DEFAULTS.deflateLevel;
  if (value.toLowerCase() === "off") return null;
  const level = DEFLATE_LEVELS.find((l) => String(l) === value);
  if (level === undefined) {
    throw new Error(`HUFFPACK_DEFLATE_LEVEL must be 0-9 or "off", got "${raw}"`);
  }
  return level;
};

const parseFlag = (name: string, raw: string | undefined, fallback: boolean): boolean => {
  const value = raw?.trim().toLowerCase();
  if (!value) return fallback;
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false") return false;
  throw new Error(`${name} must be one of 1, 0, true, false, got "${raw}"`);
};

export const loadConfig = (env: Env = process.env): HuffpackConfig => ({
  deflateLevel: parseDeflateLevel(env.HUFFPACK_DEFLATE_LEVEL),
  verify: parseFlag("HUFFPACK_VERIFY", env.HUFFPACK_VERIFY, CONFIG_DEFAULTS.verify),
});
