import { Command } from 'commander';
import type { Task, TaskResult } from '@tasklet/core';
import { anyFailed } from '@tasklet/core';
import * as out from '../output.js';
import { $try, forEachTask, resolveScope, type CliContext, type ScopeOptions } from '../helpers.js';

function setCompleted(ctx: CliContext, task: Task, completed: boolean): TaskResult {
  if (task.completed === completed) {
    return { type: 'no-change', message: `Task ${task.id} is already ${completed ? 'checked' : 'unchecked'}` };
  }
  ctx.manager.setCompleted(task.id, completed);
  return { type: 'success', message: `Task ${task.id} '${task.title}' ${completed ? 'checked' : 'unchecked'}` };
}

function createCompletionCommand(ctx: CliContext, name: string, completed: boolean): Command {
  return new Command(name)
    .description(`${completed ? 'Check' : 'Uncheck'} one or more tasks`)
    .argument('<tasks...>', 'Task IDs or titles')
    .option('-c, --category <category>', 'Look titles up in this category')
    .action((inputs: string[], opts: ScopeOptions) => $try(() => {
      const scope = resolveScope(ctx, opts.category);
      const batch = forEachTask(ctx, inputs, scope, task => setCompleted(ctx, task, completed));
      out.printBatchResults(batch);
      if (anyFailed(batch)) process.exitCode = 1;
    }));
}

export function createCheckCommand(ctx: CliContext): Command {
  return createCompletionCommand(ctx, 'check', true);
}

export function createUncheckCommand(ctx: CliContext): Command {
  return createCompletionCommand(ctx, 'uncheck', false);
}
