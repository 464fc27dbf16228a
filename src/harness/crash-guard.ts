/**
 * Process-wide crash counter
 *
 * Turns a fault that would otherwise end the test's execution unit into a
 * countable event. The engine snapshots the counter before a test and compares
 * it after the join; any change means the test crashed.
 *
 * The counter lives in a SharedArrayBuffer so a worker thread's
 * `uncaughtException` handler can bump it with `Atomics.add` before the worker
 * exits. Interception is best-effort: state touched by the faulting unit is not
 * rolled back.
 */

export interface CrashGuard {
  /** Idempotent */
  install(): void;
  isInstalled(): boolean;
  snapshot(): number;
  /** Count one fault observed outside a worker's own handler */
  signal(fault?: unknown): void;
  /** Attach the fault to a crash a worker already counted itself */
  remember(fault: unknown): void;
  /** Fault of the most recent crash, if it was known */
  lastFault(): unknown;
  /** Buffer handed to worker threads so they can count their own faults */
  sharedCounter(): SharedArrayBuffer;
}

export class AtomicCrashGuard implements CrashGuard {
  private readonly buffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
  private readonly counter = new Int32Array(this.buffer);
  private installed = false;
  private fault: unknown;

  install(): void {
    this.installed = true;
  }

  isInstalled(): boolean {
    return this.installed;
  }

  snapshot(): number {
    return Atomics.load(this.counter, 0);
  }

  signal(fault?: unknown): void {
    this.fault = fault;
    Atomics.add(this.counter, 0, 1);
  }

  remember(fault: unknown): void {
    this.fault = fault;
  }

  lastFault(): unknown {
    return this.fault;
  }

  sharedCounter(): SharedArrayBuffer {
    return this.buffer;
  }
}

let processGuard: CrashGuard | null = null;

/**
 * Guard shared by every suite in the process
 */
export function getCrashGuard(): CrashGuard {
  if (!processGuard) {
    processGuard = new AtomicCrashGuard();
  }
  return processGuard;
}
