/**
 * CLI helpers: shared context, reference resolution, error handling.
 */

import { InvalidArgumentError } from 'commander';
import type {
  CategoryScope, LifecycleManager, StorageBackend, Task, TaskResult, BatchResult,
} from '@tasklet/core';
import {
  AmbiguousError, NotFoundError, ValidationError,
  errorMessage, parseId, parsePriority, resolveCategoryScope, resolveTask,
} from '@tasklet/core';
import type { Priority } from '@tasklet/core';
import * as out from './output.js';

/** What every command works against */
export interface CliContext {
  readonly store: StorageBackend;
  readonly manager: LifecycleManager;
  /** Location of the bootstrap config file */
  readonly configPath: string;
}

/** `-c, --category` shared by the commands that take task references */
export interface ScopeOptions {
  category?: string;
}

/** Scope for name lookups; undefined searches every live task */
export function resolveScope(ctx: CliContext, category: string | undefined): CategoryScope | undefined {
  return category === undefined ? undefined : resolveCategoryScope(ctx.store, category);
}

/**
 * Resolve every reference and apply `fn` to each task found. Lookup failures
 * become per-item results so one bad reference does not stop the rest.
 */
export function forEachTask(
  ctx: CliContext,
  inputs: readonly string[],
  scope: CategoryScope | undefined,
  fn: (task: Task) => TaskResult,
): BatchResult {
  const results = inputs.map((input): TaskResult => {
    try {
      return fn(resolveTask(ctx.store, input, scope));
    } catch (err: unknown) {
      if (err instanceof AmbiguousError) {
        return { type: 'ambiguous', input, candidateIds: err.candidates.map(c => c.id) };
      }
      if (err instanceof NotFoundError) return { type: 'not-found', input };
      if (err instanceof ValidationError) return { type: 'error', message: err.message };
      throw err;
    }
  });
  return { results };
}

// --- Argument parsers (commander custom option processing) ---

export function priorityArg(value: string): Priority {
  try {
    return parsePriority(value);
  } catch (err: unknown) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

export function versionArg(value: string): number {
  const version = parseId(value);
  if (version === null) throw new InvalidArgumentError(`'${value}' is not a schema version`);
  return version;
}

/**
 * Run a command action, printing any error. Ambiguous references also list
 * the candidates. The process exit code is set to 1 on failure.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(errorMessage(err));
    if (err instanceof AmbiguousError) out.printCandidates(err.candidates);
    process.exitCode = 1;
  }
}
