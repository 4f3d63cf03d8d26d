/**
 * Typed errors shared by the evaluation engine, stores and HTTP layer.
 */

export type ErrorCode =
  | "NotFound"
  | "InvalidInput"
  | "Persistence"
  | "TaskConfig"
  | "Judge";

export interface AppErrorOptions {
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.cause = options.cause;
  }
}

/** Evaluation or task does not exist. Nothing was mutated. */
export class NotFoundError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("NotFound", message, options);
  }
}

/** Caller supplied something the engine refuses (unknown agent, bad body, failed evaluation). */
export class InvalidInputError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("InvalidInput", message, options);
  }
}

/** Result store could not read or write. The caller may retry. */
export class PersistenceError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("Persistence", message, options);
  }
}

/** Task document missing, unreadable or invalid. */
export class TaskConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("TaskConfig", message, options);
  }
}

/** Judge call failed: timeout, transport or unusable reply. Recovered inside the judge scorer. */
export class JudgeError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("Judge", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
