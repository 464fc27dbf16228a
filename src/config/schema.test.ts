/**
 * Tests for configuration schema
 */

import { describe, it, expect } from "vitest";
import {
  HarnessConfigSchema,
  HarnessConfigOverridesSchema,
  validateConfig,
  createDefaultConfig,
} from "./schema.js";

describe("HarnessConfigSchema", () => {
  it("should fill defaults for an empty object", () => {
    const result = HarnessConfigSchema.parse({});

    expect(result).toEqual(createDefaultConfig());
  });

  it("should reject an unknown color mode", () => {
    const result = HarnessConfigSchema.safeParse({ reporter: { color: "sometimes" } });

    expect(result.success).toBe(false);
  });

  it("should reject non-positive resource limits", () => {
    const result = HarnessConfigSchema.safeParse({
      isolation: { resourceLimits: { maxOldGenerationSizeMb: 0 } },
    });

    expect(result.success).toBe(false);
  });
});

describe("HarnessConfigOverridesSchema", () => {
  it("should not add defaults", () => {
    const result = HarnessConfigOverridesSchema.parse({ reporter: { quiet: true } });

    expect(result).toEqual({ reporter: { quiet: true } });
  });

  it("should reject unknown top-level keys", () => {
    const result = HarnessConfigOverridesSchema.safeParse({ abortOnFail: true });

    expect(result.success).toBe(false);
  });
});

describe("validateConfig", () => {
  it("should return data for valid config", () => {
    const result = validateConfig({ abortOnFailure: true });

    expect(result.success).toBe(true);
    expect(result.data?.abortOnFailure).toBe(true);
  });

  it("should return the zod error for invalid config", () => {
    const result = validateConfig({ abortOnFailure: "yes" });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(["abortOnFailure"]);
  });
});
