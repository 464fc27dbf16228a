/**
 * Error handling for guarded-suite
 * Custom error types with context and recovery information
 */

/**
 * Base error class for guarded-suite
 */
export class HarnessError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "HarnessError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, HarnessError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Invalid constructor or call argument
 */
export class InvalidArgumentError extends HarnessError {
  readonly argument: string;

  constructor(message: string, options: { argument: string }) {
    super(message, {
      code: "INVALID_ARGUMENT",
      context: { argument: options.argument },
      recoverable: false,
      suggestion: `Provide a valid value for '${options.argument}'`,
    });
    this.name = "InvalidArgumentError";
    this.argument = options.argument;
  }
}

/**
 * Operations of the engine that can fail outside of a test body
 */
export type EngineOperation = "install" | "spawn" | "join";

/**
 * The engine could not execute a test at all
 */
export class EngineError extends HarnessError {
  readonly operation: EngineOperation;
  readonly test?: string;

  constructor(
    message: string,
    options: {
      operation: EngineOperation;
      test?: string;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "ENGINE_ERROR",
      context: { operation: options.operation, test: options.test },
      recoverable: false,
      suggestion: options.test
        ? `Test '${options.test}' was not recorded. Fix the cause and call step() again.`
        : undefined,
      cause: options.cause,
    });
    this.name = "EngineError";
    this.operation = options.operation;
    this.test = options.test;
  }
}

/**
 * Operation not allowed in the current suite state
 */
export class SuiteStateError extends HarnessError {
  readonly state: string;

  constructor(message: string, options: { state: string }) {
    super(message, {
      code: "SUITE_STATE_ERROR",
      context: { state: options.state },
      recoverable: true,
    });
    this.name = "SuiteStateError";
    this.state = options.state;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends HarnessError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: "Check your suite.config.json and SUITE_* environment variables",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Check if error is a specific type
 */
export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  INVALID_ARGUMENT: "Every test needs a non-empty name and a body.",
  ENGINE_ERROR: "The test could not be executed. Check the module path and export name.",
  SUITE_STATE_ERROR: "Wait for the running test to finish, or reset() the suite.",
  CONFIG_ERROR: "Check your suite.config.json and SUITE_* environment variables.",
  UNEXPECTED_ERROR: "An unexpected error occurred inside the harness.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof HarnessError) {
    let message = `[${error.code}] ${error.message}`;
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
