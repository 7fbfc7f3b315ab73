import { Command } from 'commander';
import { anyFailed } from '@tasklet/core';
import * as out from '../output.js';
import { $try, forEachTask, resolveScope, type CliContext, type ScopeOptions } from '../helpers.js';

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Move one or more tasks to the Deleted category')
    .argument('<tasks...>', 'Task IDs or titles')
    .option('-c, --category <category>', 'Look titles up in this category')
    .action((inputs: string[], opts: ScopeOptions) => $try(() => {
      const scope = resolveScope(ctx, opts.category);
      const batch = forEachTask(ctx, inputs, scope, task => {
        if (task.deleted) return { type: 'no-change', message: `Task ${task.id} is already deleted` };
        ctx.manager.deleteTask(task.id);
        return { type: 'success', message: `Task ${task.id} '${task.title}' moved to Deleted` };
      });
      out.printBatchResults(batch);
      if (anyFailed(batch)) process.exitCode = 1;
    }));
}

export function createFlushCommand(ctx: CliContext): Command {
  return new Command('flush')
    .description('Permanently remove every deleted task')
    .action(() => $try(() => {
      const purged = ctx.manager.flush();
      if (purged === 0) {
        out.info('No deleted tasks to remove');
        return;
      }
      out.success(`Permanently removed ${purged} deleted task(s)`);
    }));
}
