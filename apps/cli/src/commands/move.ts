import { Command } from 'commander';
import type { LogBuffer } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import { $try, withBoard, report, parseTaskId, parsePosition } from '../helpers.js';

export function createMoveCommand(logBuffer: LogBuffer): Command {
  return new Command('move')
    .description('Move a task to a position in the list (1 = top)')
    .argument('<taskId>', 'The id of the task to move')
    .argument('<position>', 'New 1-based position')
    .action((taskId: string, position: string, _opts: unknown, cmd: Command) => $try(async () => {
      const id = parseTaskId(taskId);
      const index = parsePosition(position);
      await withBoard(cmd.optsWithGlobals<GlobalOptions>(), logBuffer, async (board) => {
        report(await board.drop(id, index), (outcome) => {
          if (outcome.persisted.length === 0) out.info(`Task #${id} is already there`);
          else if (outcome.rebalanced) out.success(`Task #${id} moved (list renumbered)`);
          else out.success(`Task #${id} moved`);
        });
      });
    }));
}
