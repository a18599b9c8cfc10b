import type { FailureReason } from './types/failure';

/**
 * Error codes used throughout the harness.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'TaskError'
  // Runtime errors (exit code 1)
  | 'ToolError'
  | 'PathEscapeError'
  | 'SymlinkError'
  | 'SandboxError'
  | 'TimeoutError'
  | 'ProcessError'
  | 'InterruptedError'
  | 'StageFailedError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all harness errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('SandboxError', 'docker exited before reporting a status', {
 *   cause: originalError,
 *   details: { image: 'python:3.11' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect, or when code calls an API with
 * a value outside its contract.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a task definition cannot be loaded.
 */
export class TaskLoadError extends AppError {
  /** The task file that failed to load */
  public readonly taskPath: string;

  constructor(taskPath: string, message: string, options: AppErrorOptions = {}) {
    super('TaskError', `Invalid task ${taskPath}: ${message}`, options);
    this.taskPath = taskPath;
  }
}

/**
 * Error thrown when a suite directory does not exist under the tasks root.
 */
export class SuiteNotFoundError extends AppError {
  public readonly suite: string;

  constructor(suite: string, options: AppErrorOptions = {}) {
    super('TaskError', `Suite not found: ${suite}`, options);
    this.suite = suite;
  }
}

/**
 * Error thrown when a tool execution fails.
 */
export class ToolError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ToolError', message, options);
  }
}

/**
 * Error thrown when a path resolves outside of the workspace root.
 */
export class PathEscapeError extends AppError {
  public readonly path: string;

  constructor(path: string, root: string, options: AppErrorOptions = {}) {
    super('PathEscapeError', `Path escapes workspace: ${path}`, {
      ...options,
      details: { path, root },
    });
    this.path = path;
  }
}

/**
 * Error thrown when a path walks through a symlinked component.
 */
export class SymlinkError extends AppError {
  public readonly path: string;
  /** The first component found to be a symlink */
  public readonly component: string;

  constructor(path: string, component: string, options: AppErrorOptions = {}) {
    super('SymlinkError', `Symlinks are not allowed: ${component}`, {
      ...options,
      details: { path, component },
    });
    this.path = path;
    this.component = component;
  }
}

/**
 * Error thrown when the sandbox process cannot be started or talked to.
 * A command that runs and exits nonzero is not a SandboxError.
 */
export class SandboxError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SandboxError', message, options);
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  /** Deadline that elapsed, in milliseconds */
  public readonly timeoutMs: number;

  constructor(message: string, options: AppErrorOptions & { timeoutMs: number }) {
    super('TimeoutError', message, options);
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when the user interrupts a run.
 */
export class InterruptedError extends AppError {
  constructor(message = 'Interrupted', options: AppErrorOptions = {}) {
    super('InterruptedError', message, options);
  }
}

/**
 * Error thrown by a single-task run when an infrastructure stage fails.
 */
export class StageFailedError extends AppError {
  public readonly reason: FailureReason;

  constructor(reason: FailureReason, message: string, options: AppErrorOptions = {}) {
    super('StageFailedError', message, options);
    this.reason = reason;
  }
}

/**
 * Error thrown by the suite runner after an interrupt, once the in-flight
 * attempt has been recorded and run metadata written.
 */
export class SuiteInterruptedError extends InterruptedError {
  /** Tasks that were never started */
  public readonly notAttempted: number;
  public readonly runDir: string;

  constructor(runDir: string, notAttempted: number) {
    super(`Suite interrupted; ${notAttempted} task(s) not attempted`, {
      details: { runDir, notAttempted },
    });
    this.runDir = runDir;
    this.notAttempted = notAttempted;
  }
}

/**
 * True for interrupts raised by the harness and for aborts surfaced by Node APIs.
 */
export function isInterrupt(error: unknown): boolean {
  if (error instanceof InterruptedError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
