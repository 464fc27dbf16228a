/**
 * Tests for environment overrides
 */

import { describe, it, expect } from "vitest";
import { readEnvOverrides } from "./env.js";
import { ConfigError } from "../utils/errors.js";

describe("readEnvOverrides", () => {
  it("should return nothing for an empty environment", () => {
    expect(readEnvOverrides({})).toEqual({});
  });

  it("should parse boolean-like values", () => {
    const overrides = readEnvOverrides({ SUITE_ABORT_ON_FAILURE: "yes", SUITE_QUIET: "0" });

    expect(overrides).toEqual({ abortOnFailure: true, reporter: { quiet: false } });
  });

  it("should ignore empty values", () => {
    expect(readEnvOverrides({ SUITE_ABORT_ON_FAILURE: "", SUITE_LOG_LEVEL: "" })).toEqual({});
  });

  it("should parse enums case-insensitively", () => {
    const overrides = readEnvOverrides({ SUITE_COLOR: "Always", SUITE_LOG_LEVEL: "DEBUG" });

    expect(overrides).toEqual({ reporter: { color: "always" }, logging: { level: "debug" } });
  });

  it("should let NO_COLOR win over SUITE_COLOR", () => {
    const overrides = readEnvOverrides({ SUITE_COLOR: "always", NO_COLOR: "1" });

    expect(overrides.reporter?.color).toBe("never");
  });

  it("should enable file logging when a log directory is given", () => {
    const overrides = readEnvOverrides({ SUITE_LOG_DIR: "/tmp/suite-logs" });

    expect(overrides.logging).toEqual({ logDir: "/tmp/suite-logs", logToFile: true });
  });

  it("should reject invalid booleans", () => {
    expect(() => readEnvOverrides({ SUITE_QUIET: "maybe" })).toThrow(ConfigError);
  });

  it("should name the variable in the issue", () => {
    try {
      readEnvOverrides({ SUITE_LOG_LEVEL: "loud" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues[0]?.path).toBe("SUITE_LOG_LEVEL");
      }
    }
  });
});
