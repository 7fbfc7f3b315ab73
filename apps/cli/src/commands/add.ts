import { Command } from 'commander';
import type { Priority } from '@tasklet/core';
import { categoryLabel } from '@tasklet/core';
import * as out from '../output.js';
import { $try, priorityArg, resolveScope, type CliContext } from '../helpers.js';

interface AddOptions {
  category?: string;
  priority?: Priority;
  description?: string;
}

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-c, --category <category>', 'Category name or ID ("uncategorized" for none)')
    .option('-p, --priority <level>', 'Priority (high, medium, low)', priorityArg)
    .option('-d, --description <text>', 'Longer description')
    .action((title: string, opts: AddOptions) => $try(() => {
      const task = ctx.manager.addTask(title, {
        categoryId: resolveScope(ctx, opts.category),
        priority: opts.priority,
        description: opts.description,
      });
      const where = categoryLabel(task.categoryId, ctx.store.listCategories());
      out.success(`Task ${task.id} saved to '${where}'. Use the list command to see your tasks`);
    }));
}
