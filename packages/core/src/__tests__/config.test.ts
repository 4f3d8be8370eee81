import { assert, describe, test } from "@cellflex/testkit";
import {
  DEFAULT_LAYOUT_CONFIG,
  createLayoutConfig,
  normalizeBreakpointThresholds,
  readLayoutConfigFromEnv,
} from "../config.js";
import { CellflexError } from "../errors.js";

function assertInvalidConfig(run: () => unknown, pattern: RegExp): void {
  assert.throws(run, (err: unknown) => {
    if (!(err instanceof CellflexError)) return false;
    assert.equal(err.code, "CFLX_INVALID_CONFIG");
    assert.match(err.message, pattern);
    return true;
  });
}

describe("createLayoutConfig", () => {
  test("defaults", () => {
    const config = createLayoutConfig();
    assert.equal(config.colorLevel, 0);
    assert.equal(config.devMode, false);
    assert.equal(config.minRowWidth, 10);
    assert.equal(config.minColumnHeight, 3);
    assert.deepEqual(config.breakpoints, { small: 80, medium: 120 });
    assert.equal(config.theme, DEFAULT_LAYOUT_CONFIG.theme);
  });

  test("bad values fall back instead of throwing", () => {
    const config = createLayoutConfig({ colorLevel: 7, minRowWidth: -5, minColumnHeight: 2.9 });
    assert.equal(config.colorLevel, 0);
    assert.equal(config.minRowWidth, 10);
    assert.equal(config.minColumnHeight, 2);
  });

  test("breakpoint thresholds are kept in order", () => {
    assert.deepEqual(normalizeBreakpointThresholds({ small: 130 }), { small: 120, medium: 130 });
    assert.deepEqual(normalizeBreakpointThresholds({ small: -1, medium: 100 }), {
      small: 80,
      medium: 100,
    });
  });
});

describe("readLayoutConfigFromEnv", () => {
  test("reads every variable", () => {
    const config = readLayoutConfigFromEnv({
      CELLFLEX_COLOR_LEVEL: "2",
      CELLFLEX_DEV: "yes",
      CELLFLEX_BREAKPOINT_SMALL: "60",
      CELLFLEX_BREAKPOINT_MEDIUM: "100",
    });
    assert.equal(config.colorLevel, 2);
    assert.equal(config.devMode, true);
    assert.deepEqual(config.breakpoints, { small: 60, medium: 100 });
  });

  test("an empty environment keeps the base", () => {
    const config = readLayoutConfigFromEnv({}, { colorLevel: 3, devMode: true });
    assert.equal(config.colorLevel, 3);
    assert.equal(config.devMode, true);
  });

  test("NO_COLOR forces level 0 unless a level is set explicitly", () => {
    assert.equal(readLayoutConfigFromEnv({ NO_COLOR: "1" }, { colorLevel: 3 }).colorLevel, 0);
    assert.equal(
      readLayoutConfigFromEnv({ NO_COLOR: "1", CELLFLEX_COLOR_LEVEL: "1" }).colorLevel,
      1,
    );
  });

  test("malformed values throw CFLX_INVALID_CONFIG", () => {
    assertInvalidConfig(
      () => readLayoutConfigFromEnv({ CELLFLEX_COLOR_LEVEL: "5" }),
      /CELLFLEX_COLOR_LEVEL/,
    );
    assertInvalidConfig(() => readLayoutConfigFromEnv({ CELLFLEX_DEV: "maybe" }), /CELLFLEX_DEV/);
    assertInvalidConfig(
      () => readLayoutConfigFromEnv({ CELLFLEX_BREAKPOINT_SMALL: "-3" }),
      /positive integer/,
    );
    assertInvalidConfig(
      () =>
        readLayoutConfigFromEnv({
          CELLFLEX_BREAKPOINT_SMALL: "100",
          CELLFLEX_BREAKPOINT_MEDIUM: "90",
        }),
      /must not exceed/,
    );
  });

  test("the error carries its name and code", () => {
    const err = new CellflexError("CFLX_INVALID_CONFIG");
    assert.equal(err.name, "CellflexError");
    assert.equal(err.message, "CFLX_INVALID_CONFIG");
    assert.ok(err instanceof Error);
  });
});
