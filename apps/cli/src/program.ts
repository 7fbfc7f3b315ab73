import { Command } from 'commander';
import type { CliContext } from './helpers.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createUpdateCommand } from './commands/update.js';
import { createMoveCommand } from './commands/move.js';
import { createDeleteCommand, createFlushCommand } from './commands/delete.js';
import { createRestoreCommand } from './commands/restore.js';
import { createCategoryCommand } from './commands/category.js';
import { createConfigCommand } from './commands/config.js';
import { createDbCommand } from './commands/db.js';

export const VERSION = '1.0.0';

/** Build the CLI program over an open store */
export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('tasklet')
    .description('Personal task tracker')
    .version(VERSION);

  program.addCommand(createAddCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createCheckCommand(ctx));
  program.addCommand(createUncheckCommand(ctx));
  program.addCommand(createUpdateCommand(ctx));
  program.addCommand(createMoveCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createRestoreCommand(ctx));
  program.addCommand(createFlushCommand(ctx));
  program.addCommand(createCategoryCommand(ctx));
  program.addCommand(createConfigCommand(ctx));
  program.addCommand(createDbCommand(ctx));

  // Default action (no command): show task list
  program.action((_opts: unknown, cmd: Command) => {
    cmd.commands.find(c => c.name() === 'list')?.parse([], { from: 'user' });
  });

  return program;
}
