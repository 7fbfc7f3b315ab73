import { Command } from 'commander';
import { DELETED_CATEGORY_ID, categoryLabel, resolveCategoryScope, resolveTask } from '@tasklet/core';
import * as out from '../output.js';
import { $try, type CliContext } from '../helpers.js';

export function createRestoreCommand(ctx: CliContext): Command {
  return new Command('restore')
    .description('Bring a deleted task back')
    .argument('<id>', 'ID of the deleted task')
    .argument('[category]', 'Category to restore into (default: uncategorized)')
    .action((input: string, target: string | undefined) => $try(() => {
      const task = resolveTask(ctx.store, input, DELETED_CATEGORY_ID);
      const targetId = target === undefined ? null : resolveCategoryScope(ctx.store, target);
      const restored = ctx.manager.restoreTask(task.id, targetId);
      const where = categoryLabel(restored.categoryId, ctx.store.listCategories());
      out.success(`Task ${restored.id} '${restored.title}' restored to '${where}'`);
    }));
}
