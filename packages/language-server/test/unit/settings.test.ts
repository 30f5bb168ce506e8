import { describe, test, expect, vi } from "vitest";
import { settingsToCompileOptions } from "@itl/language-server";

function createLogger() {
  return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("settingsToCompileOptions", () => {
  test("reads a known grammar profile", () => {
    expect(settingsToCompileOptions({ grammar: "compat" }, createLogger())).toEqual({ grammar: "compat" });
  });

  test("treats missing settings as defaults", () => {
    const logger = createLogger();
    expect(settingsToCompileOptions(undefined, logger)).toEqual({});
    expect(settingsToCompileOptions({}, logger)).toEqual({});
    expect(settingsToCompileOptions({ grammar: null }, logger)).toEqual({});
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test("warns about an unknown profile", () => {
    const logger = createLogger();
    expect(settingsToCompileOptions({ grammar: 2 }, logger)).toEqual({});
    expect(logger.warn).toHaveBeenCalledWith('ignoring itl.grammar=2; expected "current" or "compat"');
  });
});
