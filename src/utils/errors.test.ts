/**
 * Tests for error utilities
 */

import { describe, it, expect } from "vitest";
import {
  HarnessError,
  InvalidArgumentError,
  EngineError,
  SuiteStateError,
  ConfigError,
  isHarnessError,
  formatError,
  toError,
} from "./errors.js";

describe("HarnessError", () => {
  it("should create error with required properties", () => {
    const error = new HarnessError("Test error", { code: "TEST_ERROR" });

    expect(error.message).toBe("Test error");
    expect(error.code).toBe("TEST_ERROR");
    expect(error.recoverable).toBe(false);
    expect(error.context).toEqual({});
    expect(error.name).toBe("HarnessError");
  });

  it("should serialize to JSON with cause", () => {
    const cause = new Error("Cause error");
    const error = new HarnessError("Test error", {
      code: "TEST_ERROR",
      context: { foo: "bar" },
      cause,
    });

    const json = error.toJSON();

    expect(json.code).toBe("TEST_ERROR");
    expect(json.context).toEqual({ foo: "bar" });
    expect(json.cause).toBe("Cause error");
  });
});

describe("InvalidArgumentError", () => {
  it("should name the offending argument", () => {
    const error = new InvalidArgumentError("Missing name", { argument: "name" });

    expect(error.code).toBe("INVALID_ARGUMENT");
    expect(error.argument).toBe("name");
    expect(error.suggestion).toBe("Provide a valid value for 'name'");
    expect(error).toBeInstanceOf(HarnessError);
  });
});

describe("EngineError", () => {
  it("should carry the failed operation and test", () => {
    const cause = new Error("spawn failed");
    const error = new EngineError("Could not spawn", {
      operation: "spawn",
      test: "test_a",
      cause,
    });

    expect(error.code).toBe("ENGINE_ERROR");
    expect(error.operation).toBe("spawn");
    expect(error.test).toBe("test_a");
    expect(error.context).toEqual({ operation: "spawn", test: "test_a" });
    expect(error.cause).toBe(cause);
  });
});

describe("SuiteStateError", () => {
  it("should record the state", () => {
    const error = new SuiteStateError("Busy", { state: "running" });

    expect(error.state).toBe("running");
    expect(error.recoverable).toBe(true);
  });
});

describe("ConfigError", () => {
  it("should format issues", () => {
    const error = new ConfigError("Invalid configuration", {
      issues: [
        { path: "reporter.color", message: "Invalid enum value" },
        { path: "abortOnFailure", message: "Expected boolean" },
      ],
    });

    expect(error.formatIssues()).toBe(
      "  - reporter.color: Invalid enum value\n  - abortOnFailure: Expected boolean",
    );
  });

  it("should format nothing without issues", () => {
    expect(new ConfigError("x").formatIssues()).toBe("");
  });
});

describe("isHarnessError", () => {
  it("should recognize subclasses only", () => {
    expect(isHarnessError(new SuiteStateError("x", { state: "idle" }))).toBe(true);
    expect(isHarnessError(new Error("x"))).toBe(false);
    expect(isHarnessError("x")).toBe(false);
  });
});

describe("formatError", () => {
  it("should include code and suggestion", () => {
    const error = new InvalidArgumentError("Missing name", { argument: "name" });

    expect(formatError(error)).toBe(
      "[INVALID_ARGUMENT] Missing name\n  Suggestion: Provide a valid value for 'name'",
    );
  });

  it("should fall back to the code's default suggestion", () => {
    const error = new SuiteStateError("Busy", { state: "running" });

    expect(formatError(error)).toBe(
      "[SUITE_STATE_ERROR] Busy\n  Suggestion: Wait for the running test to finish, or reset() the suite.",
    );
  });

  it("should format plain errors and other values", () => {
    expect(formatError(new Error("oops"))).toBe(
      "oops\n  Suggestion: An unexpected error occurred inside the harness.",
    );
    expect(formatError(42)).toBe("42");
  });
});

describe("toError", () => {
  it("should wrap non-errors", () => {
    const original = new Error("x");
    expect(toError(original)).toBe(original);
    expect(toError("text").message).toBe("text");
  });
});
