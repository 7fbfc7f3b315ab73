import type { TaskId } from './task.js';

/** Per-item outcome of a batch command (check, delete, ...) */
export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'not-found'; readonly input: string }
  | { readonly type: 'ambiguous'; readonly input: string; readonly candidateIds: readonly TaskId[] }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export interface BatchResult {
  readonly results: readonly TaskResult[];
}

export function isError(r: TaskResult): boolean {
  return r.type === 'error' || r.type === 'not-found' || r.type === 'ambiguous';
}

export function anyFailed(batch: BatchResult): boolean {
  return batch.results.some(r => isError(r));
}
