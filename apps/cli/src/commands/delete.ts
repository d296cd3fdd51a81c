import { Command } from 'commander';
import type { LogBuffer } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import { $try, withBoard, report, parseTaskId } from '../helpers.js';

export function createDeleteCommand(logBuffer: LogBuffer): Command {
  return new Command('delete')
    .alias('rm')
    .description('Delete one or more tasks; several ids are deleted all-or-nothing')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const ids = taskIds.map(parseTaskId);
      await withBoard(cmd.optsWithGlobals<GlobalOptions>(), logBuffer, async (board) => {
        const [only] = ids;
        if (ids.length === 1 && only !== undefined) {
          report(await board.removeTask(only), (id) => out.success(`Task #${id} deleted`));
        } else {
          report(await board.sync.batchDelete(ids), (outcome) => out.success(outcome.message));
        }
      });
    }));
}
