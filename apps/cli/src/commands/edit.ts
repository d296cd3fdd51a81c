import { Command } from 'commander';
import type { LogBuffer, TaskPatch } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import {
  $try, withBoard, report, parseTaskId, requirePriority, parseDateArg, resolveCategoryArg,
} from '../helpers.js';

type EditOptions = GlobalOptions & {
  priority?: string;
  start?: string;
  due?: string;
  category?: string;
};

export function createEditCommand(logBuffer: LogBuffer): Command {
  return new Command('edit')
    .description('Change a task\'s text, priority, dates or category')
    .argument('<taskId>', 'The id of the task')
    .argument('[content...]', 'New task text')
    .option('-p, --priority <level>', 'New priority')
    .option('-s, --start <date>', 'New start date, or "none" to clear')
    .option('-d, --due <date>', 'New due date, or "none" to clear')
    .option('-c, --category <idOrName>', 'New category, or "none" to clear')
    .action((taskId: string, content: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const g = cmd.optsWithGlobals<EditOptions>();
      const id = parseTaskId(taskId);

      await withBoard(g, logBuffer, async (board) => {
        const patch: TaskPatch = {
          content: content.length > 0 ? content.join(' ') : undefined,
          priority: g.priority === undefined ? undefined : requirePriority(g.priority),
          startDate: g.start === undefined ? undefined : parseDateArg(g.start),
          dueDate: g.due === undefined ? undefined : parseDateArg(g.due),
          categoryId: g.category === undefined
            ? undefined
            : resolveCategoryArg(g.category, board.getSnapshot().categories),
        };
        report(await board.sync.updateTask(id, patch), (task) => out.success(`Task #${task.id} updated`));
      });
    }));
}
