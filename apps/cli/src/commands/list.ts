import { Command } from 'commander';
import type { Priority, Task, TaskFilter } from '@tasklet/core';
import { DELETED_CATEGORY_ID } from '@tasklet/core';
import * as out from '../output.js';
import { $try, priorityArg, resolveScope, type CliContext } from '../helpers.js';

interface ListOptions {
  category?: string;
  search?: string;
  priority?: Priority;
  done?: boolean;
  pending?: boolean;
  deleted?: boolean;
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List tasks grouped by category')
    .option('-c, --category <category>', 'Only tasks in this category')
    .option('-s, --search <text>', 'Only titles containing this text (case-insensitive)')
    .option('-p, --priority <level>', 'Filter by priority (high, medium, low)', priorityArg)
    .option('--done', 'Show only completed tasks')
    .option('--pending', 'Show only open tasks')
    .option('--deleted', 'Show the Deleted category')
    .action((opts: ListOptions) => $try(() => {
      if (opts.done && opts.pending) {
        out.error('Cannot use both --done and --pending at the same time');
        process.exitCode = 1;
        return;
      }
      if (opts.deleted && opts.category !== undefined) {
        out.error('Cannot use both --deleted and --category at the same time');
        process.exitCode = 1;
        return;
      }

      const filter: TaskFilter = {
        categoryId: opts.deleted ? DELETED_CATEGORY_ID : resolveScope(ctx, opts.category),
        search: opts.search,
        priority: opts.priority,
        completed: opts.done ? true : opts.pending ? false : undefined,
      };
      displayTasks(ctx, ctx.store.listTasks(filter));
    }));
}

function displayTasks(ctx: CliContext, tasks: readonly Task[]): void {
  if (tasks.length === 0) {
    out.info('No tasks found... use the add command to create one');
    return;
  }

  const categories = ctx.store.listCategories();
  let previous: Task | undefined;
  for (const task of tasks) {
    // Tasks arrive ordered by category, so a heading starts each group
    if (previous === undefined || previous.categoryId !== task.categoryId) {
      if (previous !== undefined) console.log();
      console.log(out.formatHeading(task.categoryId, categories));
    }
    console.log(out.formatTask(task));
    previous = task;
  }
}
