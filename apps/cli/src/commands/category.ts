import { Command } from 'commander';
import chalk from 'chalk';
import {
  categoryLabel, getDefaultCategoryName, resolveCategory,
} from '@tasklet/core';
import * as out from '../output.js';
import { $try, type CliContext } from '../helpers.js';

interface DeleteOptions {
  to?: string;
}

export function createCategoryCommand(ctx: CliContext): Command {
  const categoryCommand = new Command('category')
    .description('Manage categories');

  categoryCommand.addCommand(
    new Command('add')
      .description('Create a category')
      .argument('<name>', 'Category name')
      .action((name: string) => $try(() => {
        const category = ctx.manager.createCategory(name);
        out.success(`Category '${category.name}' added with ID ${category.id}`);
      })),
  );

  categoryCommand.addCommand(
    new Command('list')
      .description('List categories')
      .action(() => $try(() => {
        const categories = ctx.store.listCategories();
        if (categories.length === 0) {
          out.info('No categories yet... use category add to create one');
          return;
        }
        const current = ctx.manager.currentCategory();
        const defaultName = getDefaultCategoryName(ctx.store)?.toLowerCase();
        const counts = new Map<number | null, number>();
        for (const task of ctx.store.listTasks()) {
          counts.set(task.categoryId, (counts.get(task.categoryId) ?? 0) + 1);
        }

        for (const c of categories) {
          const marks = [
            c.id === current?.id ? chalk.green('(current)') : '',
            c.name.toLowerCase() === defaultName ? chalk.cyan('(default)') : '',
          ].filter(Boolean).join(' ');
          const count = chalk.dim(`${counts.get(c.id) ?? 0} task(s)`);
          console.log(`${chalk.dim(`${c.id}:`)} ${chalk.bold(c.name)} ${count}${marks ? ` ${marks}` : ''}`);
        }
      })),
  );

  categoryCommand.addCommand(
    new Command('rename')
      .description('Rename a category')
      .argument('<category>', 'Category name or ID')
      .argument('<newName>', 'New name')
      .action((input: string, newName: string) => $try(() => {
        const category = resolveCategory(ctx.store, input);
        const renamed = ctx.manager.renameCategory(category.id, newName);
        out.success(`Category '${category.name}' renamed to '${renamed.name}'`);
      })),
  );

  categoryCommand.addCommand(
    new Command('delete')
      .description('Delete a category; its tasks become uncategorized unless --to is given')
      .argument('<category>', 'Category name or ID')
      .option('--to <category>', 'Move the tasks to this category instead')
      .action((input: string, opts: DeleteOptions) => $try(() => {
        const category = resolveCategory(ctx.store, input);
        const target = opts.to === undefined ? null : resolveCategory(ctx.store, opts.to).id;
        const result = ctx.manager.deleteCategory(category.id, target);

        out.success(`Category '${result.category.name}' deleted`);
        if (result.reassigned > 0) {
          const where = categoryLabel(result.reassignedTo, ctx.store.listCategories());
          out.info(`${result.reassigned} task(s) moved to '${where}'`);
        }
      })),
  );

  categoryCommand.addCommand(
    new Command('use')
      .description('Make new tasks go to this category by default')
      .argument('<category>', 'Category name or ID')
      .action((input: string) => $try(() => {
        const category = ctx.manager.useCategory(resolveCategory(ctx.store, input).id);
        out.success(`Now using category '${category.name}' (${category.id})`);
      })),
  );

  categoryCommand.addCommand(
    new Command('clear')
      .description('Clear the category context')
      .action(() => $try(() => {
        ctx.manager.clearCategoryContext();
        out.success('Category context cleared');
      })),
  );

  categoryCommand.addCommand(
    new Command('show')
      .description('Show the category context')
      .action(() => $try(() => {
        const current = ctx.manager.currentCategory();
        out.info(current ? `Current category: ${current.name} (${current.id})` : 'No category context set');
      })),
  );

  return categoryCommand;
}
