/**
 * Tests for TestContext
 */

import { describe, it, expect } from "vitest";
import { TestContext } from "./context.js";

describe("TestContext", () => {
  it("should start with nothing recorded", () => {
    const t = new TestContext("test_empty");

    expect(t.name).toBe("test_empty");
    expect(t.failed).toBe(false);
    expect(t.errorCount).toBe(0);
    expect(t.failureMessage).toBeUndefined();
    expect(t.errorMessages).toEqual([]);
    expect(t.startedAt).toBeUndefined();
    expect(t.endedAt).toBeUndefined();
    expect(t.failedAt).toBeUndefined();
    expect(t.errorAt).toBeUndefined();
  });

  describe("recordFailure", () => {
    it("should mark the test failed and stamp the time", () => {
      const t = new TestContext("test_fail");
      t.recordFailure("bad value", 42n);

      expect(t.failed).toBe(true);
      expect(t.failureMessage).toBe("bad value");
      expect(t.failedAt).toBe(42n);
    });

    it("should replace the previous message and keep errors", () => {
      const t = new TestContext("test_fail_twice");
      t.recordError("warning");
      t.recordFailure("first", 1n);
      t.recordFailure("second", 2n);

      expect(t.failed).toBe(true);
      expect(t.failureMessage).toBe("second");
      expect(t.failedAt).toBe(2n);
      expect(t.errorCount).toBe(1);
    });
  });

  describe("recordError", () => {
    it("should append messages in order", () => {
      const t = new TestContext("test_errors");
      t.recordError("one", 10n);
      t.recordError("two", 20n);
      t.recordError("three", 30n);

      expect(t.errorCount).toBe(3);
      expect(t.errorMessages).toEqual(["one", "two", "three"]);
      expect(t.errorAt).toBe(30n);
      expect(t.failed).toBe(false);
    });

    it("should stamp with the monotonic clock by default", () => {
      const before = process.hrtime.bigint();
      const t = new TestContext("test_clock");
      t.recordError("x");
      const after = process.hrtime.bigint();

      expect(t.errorAt).toBeGreaterThanOrEqual(before);
      expect(t.errorAt).toBeLessThanOrEqual(after);
    });
  });

  describe("duration", () => {
    it("should split elapsed time into seconds and nanoseconds", () => {
      const t = new TestContext("bench_split");
      t.markStarted(1_000n);
      t.markEnded(2_500_001_000n);

      expect(t.duration()).toEqual({ seconds: 2, nanoseconds: 500_000_000 });
    });

    it("should be zero when the end was marked without a start", () => {
      const t = new TestContext("bench_no_start");
      t.markEnded(5n);

      expect(t.endedAt).toBe(5n);
      expect(t.duration()).toEqual({ seconds: 0, nanoseconds: 0 });
    });

    it("should saturate at zero when the end precedes the start", () => {
      const t = new TestContext("bench_backwards");
      t.markStarted(100n);
      t.markEnded(50n);

      expect(t.duration()).toEqual({ seconds: 0, nanoseconds: 0 });
    });
  });
});
