import { describe, it, expect } from "vitest";
import { CONFIG_DEFAULTS, loadConfig } from "./config";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual(CONFIG_DEFAULTS);
    expect(CONFIG_DEFAULTS).toEqual({ deflateLevel: 9, verify: true });
  });

  it("reads the deflate level and verify flag", () => {
    expect(loadConfig({ HUFFPACK_DEFLATE_LEVEL: "3", HUFFPACK_VERIFY: "false" })).toEqual({
      deflateLevel: 3,
      verify: false,
    });
    expect(loadConfig({ HUFFPACK_DEFLATE_LEVEL: "OFF" }).deflateLevel).toBeNull();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ HUFFPACK_DEFLATE_LEVEL: "10" })).toThrow(
      'HUFFPACK_DEFLATE_LEVEL must be 0-9 or "off", got "10"',
    );
    expect(() => loadConfig({ HUFFPACK_VERIFY: "maybe" })).toThrow(
      'HUFFPACK_VERIFY must be one of 1, 0, true, false, got "maybe"',
    );
  });
});
