import { Command } from 'commander';
import type { LogBuffer } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import { $try, withBoard, parseTaskId } from '../helpers.js';

export function createShowCommand(logBuffer: LogBuffer): Command {
  return new Command('show')
    .description('Show one task in detail')
    .argument('<taskId>', 'The id of the task')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(async () => {
      const id = parseTaskId(taskId);
      await withBoard(cmd.optsWithGlobals<GlobalOptions>(), logBuffer, async (board) => {
        const row = board.getSnapshot().rows.find((r) => r.task.id === id);
        if (!row) throw new Error(`Task #${id} not found`);
        out.printTaskDetail(row);
      });
    }));
}
