/**
 * Error taxonomy for the tracker.
 *
 * Entity-level errors (validation, not-found, ambiguous) are expected outcomes
 * the command layer turns into messages. Storage-level errors (corruption,
 * migration, lock contention) abort the current command or startup.
 */

import type { TaskId } from './types/task.js';
import type { CategoryRef } from './types/category.js';

export const ErrorCode = {
  INVALID_INPUT: 'INVALID_INPUT',
  NOT_FOUND: 'NOT_FOUND',
  AMBIGUOUS: 'AMBIGUOUS',
  STORAGE_CORRUPTED: 'STORAGE_CORRUPTED',
  MIGRATION_FAILED: 'MIGRATION_FAILED',
  LOCK_CONTENTION: 'LOCK_CONTENTION',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface ErrorDetails {
  /** Field that caused the error */
  field?: string;
  /** The offending value */
  value?: unknown;
  [key: string]: unknown;
}

export class TaskletError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(message: string, code: ErrorCode, details: ErrorDetails = {}, cause?: unknown) {
    super(message);
    this.name = 'TaskletError';
    this.code = code;
    this.details = details;
    if (cause !== undefined) this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): { name: string; message: string; code: ErrorCode; details: ErrorDetails } {
    return { name: this.name, message: this.message, code: this.code, details: this.details };
  }
}

/** Bad input shape or value; the caller may re-prompt */
export class ValidationError extends TaskletError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, ErrorCode.INVALID_INPUT, details, cause);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends TaskletError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, ErrorCode.NOT_FOUND, details);
    this.name = 'NotFoundError';
  }
}

export interface AmbiguousCandidate {
  readonly id: TaskId;
  readonly title: string;
  readonly categoryId: CategoryRef;
  readonly categoryName: string;
}

/** A name matched several live entities; the caller decides which one */
export class AmbiguousError extends TaskletError {
  readonly input: string;
  readonly candidates: readonly AmbiguousCandidate[];

  constructor(input: string, candidates: readonly AmbiguousCandidate[]) {
    super(
      `'${input}' matches ${candidates.length} tasks; specify an ID or a category`,
      ErrorCode.AMBIGUOUS,
      { value: input },
    );
    this.name = 'AmbiguousError';
    this.input = input;
    this.candidates = candidates;
  }
}

/** Persisted data cannot be read back. Never repaired automatically. */
export class StorageCorruptionError extends TaskletError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Store at ${path} is corrupted: ${reason}`, ErrorCode.STORAGE_CORRUPTED, { path }, cause);
    this.name = 'StorageCorruptionError';
    this.path = path;
  }
}

export type MigrationDirection = 'up' | 'down';

export class MigrationError extends TaskletError {
  /** Version of the migration that failed */
  readonly version: number;
  readonly direction: MigrationDirection;
  /** Last committed schema version */
  readonly reachedVersion: number;

  constructor(
    message: string,
    opts: { version: number; direction: MigrationDirection; reachedVersion: number },
    cause?: unknown,
  ) {
    super(message, ErrorCode.MIGRATION_FAILED, { ...opts }, cause);
    this.name = 'MigrationError';
    this.version = opts.version;
    this.direction = opts.direction;
    this.reachedVersion = opts.reachedVersion;
  }
}

/** Only raised when a bounded lock wait is configured */
export class LockContentionError extends TaskletError {
  readonly lockPath: string;
  readonly waitedMs: number;

  constructor(lockPath: string, waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for lock ${lockPath}`, ErrorCode.LOCK_CONTENTION, { lockPath, waitedMs });
    this.name = 'LockContentionError';
    this.lockPath = lockPath;
    this.waitedMs = waitedMs;
  }
}

export function isTaskletError(err: unknown): err is TaskletError {
  return err instanceof TaskletError;
}

/** Entity-level errors are operational outcomes, not failures of the store */
export function isEntityError(err: unknown): err is ValidationError | NotFoundError | AmbiguousError {
  return err instanceof ValidationError || err instanceof NotFoundError || err instanceof AmbiguousError;
}

/** Render any thrown value as a single-line message */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    if (err instanceof TaskletError || err.cause === undefined) return err.message;
    return `${err.message}: ${errorMessage(err.cause)}`;
  }
  return String(err);
}
