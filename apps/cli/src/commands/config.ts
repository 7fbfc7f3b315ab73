import { Command } from 'commander';
import {
  CONFIG_KEYS, listStoreConfig, parseAssignment, parseConfigKey, resetStoreConfig,
} from '@tasklet/core';
import type { ConfigEntry } from '@tasklet/core';
import * as out from '../output.js';
import { $try, type CliContext } from '../helpers.js';
import { bootstrapEntries, readBootstrapValues, setBootstrapValue, unsetBootstrapValue } from '../config-file.js';

interface ResetOptions {
  yes?: boolean;
}

function printEntry(entry: ConfigEntry): void {
  out.info(`${entry.isDefault ? '*' : ' '}${entry.key} = ${entry.value}`);
}

export function createConfigCommand(ctx: CliContext): Command {
  const configCommand = new Command('config')
    .description('Read and change settings');

  configCommand.addCommand(
    new Command('list')
      .description('Show every setting (* marks defaults)')
      .action(() => $try(() => {
        for (const entry of listStoreConfig(ctx.store)) printEntry(entry);
        for (const entry of bootstrapEntries(readBootstrapValues(ctx.configPath))) printEntry(entry);
      })),
  );

  configCommand.addCommand(
    new Command('set')
      .description('Set a value')
      .argument('<assignment>', 'key=value')
      .action((assignment: string) => $try(() => {
        const { key, value } = parseAssignment(assignment);
        if (CONFIG_KEYS[key].scope === 'bootstrap') {
          setBootstrapValue(ctx.configPath, key, value);
          out.success(`${key} set to '${value}'; takes effect on the next run`);
          return;
        }
        const stored = ctx.manager.setConfig(key, value);
        out.success(`${key} set to '${stored}'`);
      })),
  );

  configCommand.addCommand(
    new Command('default')
      .description('Reset one key to its default')
      .argument('<key>', 'Config key')
      .action((input: string) => $try(() => {
        const key = parseConfigKey(input);
        if (CONFIG_KEYS[key].scope === 'bootstrap') {
          unsetBootstrapValue(ctx.configPath, key);
        } else {
          resetStoreConfig(ctx.store, key);
        }
        out.success(`${key} reset to its default`);
      })),
  );

  configCommand.addCommand(
    new Command('reset')
      .description('Delete all tasks and categories and start over')
      .option('-y, --yes', 'Confirm the reset')
      .action((opts: ResetOptions) => $try(() => {
        if (!opts.yes) {
          out.warning('This deletes every task, category and setting in the store.');
          out.warning('Run again with --yes to continue');
          process.exitCode = 1;
          return;
        }
        const seeded = ctx.manager.reset();
        out.success(`Store reset; created ${seeded.map(c => `'${c.name}'`).join(' and ')}`);
      })),
  );

  return configCommand;
}
