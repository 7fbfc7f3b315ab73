import { Command } from 'commander';
import chalk from 'chalk';
import { SqliteBackend, ValidationError } from '@tasklet/core';
import * as out from '../output.js';
import { $try, versionArg, type CliContext } from '../helpers.js';

interface MigrateOptions {
  to?: number;
}

function requireSqlite(ctx: CliContext): SqliteBackend {
  if (ctx.store instanceof SqliteBackend) return ctx.store;
  throw new ValidationError(`Schema migrations apply to the sqlite backend; the ${ctx.store.type} store has none`, {
    field: 'storage.type', value: ctx.store.type,
  });
}

export function createDbCommand(ctx: CliContext): Command {
  const dbCommand = new Command('db')
    .description('Storage information and schema maintenance');

  dbCommand.addCommand(
    new Command('status')
      .description('Show the active store and its schema version')
      .action(() => $try(() => {
        out.info(`Backend: ${chalk.bold(ctx.store.type)}`);
        out.info(`Path:    ${ctx.store.path}`);
        if (!(ctx.store instanceof SqliteBackend)) return;

        const { migrator } = ctx.store;
        out.info(`Schema:  v${migrator.currentVersion()} (latest v${migrator.latestVersion})`);
        const pending = migrator.pending();
        if (pending.length > 0) {
          out.warning(`Pending: ${pending.map(m => `v${m.version} ${m.description}`).join(', ')}`);
        }
      })),
  );

  dbCommand.addCommand(
    new Command('migrate')
      .description('Move the schema to a version (latest by default)')
      .option('--to <version>', 'Target schema version; lower than the current one rolls back', versionArg)
      .action((opts: MigrateOptions) => $try(() => {
        const { migrator } = requireSqlite(ctx);
        const result = migrator.migrateTo(opts.to ?? migrator.latestVersion);

        if (result.applied.length === 0) {
          out.info(`Schema already at v${result.toVersion}`);
          return;
        }
        out.success(
          `Schema migrated ${result.direction ?? ''} from v${result.fromVersion} to v${result.toVersion} `
          + `(applied ${result.applied.map(v => `v${v}`).join(', ')})`,
        );
        if (result.toVersion < migrator.latestVersion) {
          out.warning('The next run upgrades the schema to the latest version again');
        }
      })),
  );

  return dbCommand;
}
