import { Command } from 'commander';
import type { LogBuffer } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import { $try, withBoard, report, resolveCategoryArg } from '../helpers.js';

type AddCategoryOptions = GlobalOptions & {
  color?: string;
};

export function createCategoriesCommand(logBuffer: LogBuffer): Command {
  const categories = new Command('categories')
    .alias('cat')
    .description('Show and manage categories');

  categories
    .command('list', { isDefault: true })
    .description('Show all categories')
    .action((_opts: unknown, cmd: Command) => $try(async () => {
      await withBoard(cmd.optsWithGlobals<GlobalOptions>(), logBuffer, async (board) => {
        const { categories: all } = board.getSnapshot();
        if (all.length === 0) out.info('No categories yet');
        else out.printCategories(all);
      });
    }));

  categories
    .command('add')
    .description('Create a category')
    .argument('<name...>', 'Category name')
    .option('--color <hex>', 'Color as #rrggbb')
    .action((name: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const g = cmd.optsWithGlobals<AddCategoryOptions>();
      await withBoard(g, logBuffer, async (board) => {
        report(await board.addCategory(name.join(' '), g.color), (category) => {
          out.success(`Category #${category.id} "${category.name}" created`);
        });
      });
    }));

  categories
    .command('rm')
    .description('Delete a category; its tasks keep existing without one')
    .argument('<idOrName>', 'Category id or name')
    .action((idOrName: string, _opts: unknown, cmd: Command) => $try(async () => {
      await withBoard(cmd.optsWithGlobals<GlobalOptions>(), logBuffer, async (board) => {
        const id = resolveCategoryArg(idOrName, board.getSnapshot().categories);
        if (id === null) throw new Error('Name a category to delete');
        report(await board.removeCategory(id), (removed) => out.success(`Category #${removed} deleted`));
      });
    }));

  return categories;
}
