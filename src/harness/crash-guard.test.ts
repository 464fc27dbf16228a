/**
 * Tests for the crash counter
 */

import { describe, it, expect } from "vitest";
import { AtomicCrashGuard, getCrashGuard } from "./crash-guard.js";

describe("AtomicCrashGuard", () => {
  it("should install idempotently", () => {
    const guard = new AtomicCrashGuard();
    expect(guard.isInstalled()).toBe(false);

    guard.install();
    guard.install();

    expect(guard.isInstalled()).toBe(true);
    expect(guard.snapshot()).toBe(0);
  });

  it("should count signals", () => {
    const guard = new AtomicCrashGuard();
    guard.install();
    guard.signal(new Error("fault"));
    guard.signal();

    expect(guard.snapshot()).toBe(2);
  });

  it("should keep the fault of the latest signal", () => {
    const guard = new AtomicCrashGuard();
    const fault = new Error("fault");
    guard.signal(fault);

    expect(guard.lastFault()).toBe(fault);
  });

  it("should remember a fault without counting it", () => {
    const guard = new AtomicCrashGuard();
    const fault = new Error("counted by the worker");
    guard.remember(fault);

    expect(guard.snapshot()).toBe(0);
    expect(guard.lastFault()).toBe(fault);
  });

  it("should see increments made through the shared buffer", () => {
    const guard = new AtomicCrashGuard();
    const view = new Int32Array(guard.sharedCounter());
    Atomics.add(view, 0, 1);

    expect(guard.snapshot()).toBe(1);
  });
});

describe("getCrashGuard", () => {
  it("should return the same instance every time", () => {
    expect(getCrashGuard()).toBe(getCrashGuard());
  });
});
