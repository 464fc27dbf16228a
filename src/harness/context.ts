/**
 * Per-test outcome record
 */

import { elapsed, now, type Duration, type Timestamp } from "../utils/time.js";

/**
 * Mutable record of one test execution.
 *
 * The four mutators are the only way to change it. Once `failed` is set it stays
 * set, and `errorCount` only grows. Recording a failure does not stop the body:
 * a test is expected to return right after calling `recordFailure`.
 */
export class TestContext {
  readonly name: string;

  private _failed = false;
  private _failureMessage: string | undefined;
  private readonly _errorMessages: string[] = [];
  private _startedAt: Timestamp | undefined;
  private _endedAt: Timestamp | undefined;
  private _failedAt: Timestamp | undefined;
  private _errorAt: Timestamp | undefined;

  constructor(name: string) {
    this.name = name;
  }

  get failed(): boolean {
    return this._failed;
  }

  get errorCount(): number {
    return this._errorMessages.length;
  }

  get failureMessage(): string | undefined {
    return this._failureMessage;
  }

  get errorMessages(): readonly string[] {
    return this._errorMessages;
  }

  get startedAt(): Timestamp | undefined {
    return this._startedAt;
  }

  get endedAt(): Timestamp | undefined {
    return this._endedAt;
  }

  get failedAt(): Timestamp | undefined {
    return this._failedAt;
  }

  get errorAt(): Timestamp | undefined {
    return this._errorAt;
  }

  /**
   * Mark the test as failed. A later call replaces the message and stamp.
   */
  recordFailure(message: string, at: Timestamp = now()): void {
    this._failed = true;
    this._failureMessage = message;
    this._failedAt = at;
  }

  /**
   * Record a non-fatal error; the test keeps running.
   */
  recordError(message: string, at: Timestamp = now()): void {
    this._errorMessages.push(message);
    this._errorAt = at;
  }

  markStarted(at: Timestamp = now()): void {
    this._startedAt = at;
  }

  markEnded(at: Timestamp = now()): void {
    this._endedAt = at;
  }

  /**
   * Time between `markStarted` and `markEnded`. Zero if either was never called.
   */
  duration(): Duration {
    return elapsed(this._startedAt, this._endedAt);
  }
}
