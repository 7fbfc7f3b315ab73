import { Command } from 'commander';
import { DELETED_CATEGORY_ID, categoryLabel, resolveCategoryScope, resolveTask } from '@tasklet/core';
import * as out from '../output.js';
import { $try, resolveScope, type CliContext, type ScopeOptions } from '../helpers.js';

export function createMoveCommand(ctx: CliContext): Command {
  return new Command('move')
    .description('Move a task to another category ("Deleted" deletes it)')
    .argument('<task>', 'Task ID or title')
    .argument('<category>', 'Target category name or ID, or "uncategorized"')
    .option('-c, --category <category>', 'Look the title up in this category')
    .action((input: string, target: string, opts: ScopeOptions) => $try(() => {
      const task = resolveTask(ctx.store, input, resolveScope(ctx, opts.category));
      const targetId = resolveCategoryScope(ctx.store, target);

      if (task.categoryId === targetId) {
        out.info(`Task ${task.id} is already there`);
        return;
      }
      const moved = ctx.manager.moveTask(task.id, targetId);
      const where = categoryLabel(moved.categoryId, ctx.store.listCategories());
      out.success(moved.categoryId === DELETED_CATEGORY_ID
        ? `Task ${task.id} '${task.title}' moved to Deleted`
        : `Task ${task.id} '${task.title}' moved to '${where}'`);
    }));
}
