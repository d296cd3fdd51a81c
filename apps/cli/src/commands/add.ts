import { Command } from 'commander';
import type { LogBuffer } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import {
  $try, withBoard, report, requirePriority, parseDateArg, resolveCategoryArg,
} from '../helpers.js';

type AddOptions = GlobalOptions & {
  priority?: string;
  start?: string;
  due?: string;
  category?: string;
};

export function createAddCommand(logBuffer: LogBuffer): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<content...>', 'Task text')
    .option('-p, --priority <level>', 'Priority: high, medium (default) or low')
    .option('-s, --start <date>', 'Start date (yyyy-MM-dd, today, tomorrow, +3d, fri, jan15)')
    .option('-d, --due <date>', 'Due date, same formats as --start')
    .option('-c, --category <idOrName>', 'Category id or name')
    .action((content: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const g = cmd.optsWithGlobals<AddOptions>();

      await withBoard(g, logBuffer, async (board) => {
        const result = await board.addTask({
          content: content.join(' '),
          priority: g.priority === undefined ? undefined : requirePriority(g.priority),
          startDate: g.start === undefined ? null : parseDateArg(g.start),
          dueDate: g.due === undefined ? null : parseDateArg(g.due),
          categoryId: g.category === undefined
            ? null
            : resolveCategoryArg(g.category, board.getSnapshot().categories),
        });
        report(result, (task) => out.success(`Task #${task.id} added`));
      });
    }));
}
