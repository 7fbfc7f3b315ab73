import { Command } from 'commander';
import type { Priority, TaskPatch } from '@tasklet/core';
import { resolveTask } from '@tasklet/core';
import * as out from '../output.js';
import { $try, priorityArg, resolveScope, type CliContext } from '../helpers.js';

interface UpdateOptions {
  category?: string;
  title?: string;
  priority?: Priority;
  description?: string;
}

export function createUpdateCommand(ctx: CliContext): Command {
  return new Command('update')
    .description('Change the title, priority or description of a task')
    .argument('<task>', 'Task ID or title')
    .option('-t, --title <title>', 'New title')
    .option('-p, --priority <level>', 'New priority (high, medium, low)', priorityArg)
    .option('-d, --description <text>', 'New description ("" clears it)')
    .option('-c, --category <category>', 'Look the title up in this category')
    .action((input: string, opts: UpdateOptions) => $try(() => {
      const task = resolveTask(ctx.store, input, resolveScope(ctx, opts.category));
      const patch: TaskPatch = {
        title: opts.title,
        priority: opts.priority,
        description: opts.description,
      };
      if (opts.title === undefined && opts.priority === undefined && opts.description === undefined) {
        out.info('Nothing to update; pass --title, --priority or --description');
        return;
      }
      const updated = ctx.store.updateTask(task.id, patch);
      out.success(`Task ${updated.id} '${updated.title}' updated`);
    }));
}
