import { Command } from 'commander';
import type { LogBuffer } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import { $try, withBoard, report, parseTaskId, requirePriority } from '../helpers.js';

export function createPriorityCommand(logBuffer: LogBuffer): Command {
  return new Command('priority')
    .description('Set the priority of one or more tasks')
    .argument('<level>', 'Priority: high/p1, medium/p2 or low/p3')
    .argument('<taskIds...>', 'The id(s) of the task(s)')
    .action((level: string, taskIds: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const priority = requirePriority(level);
      const ids = taskIds.map(parseTaskId);
      await withBoard(cmd.optsWithGlobals<GlobalOptions>(), logBuffer, async (board) => {
        report(await board.sync.batchUpdate(ids, { priority }), (outcome) => out.success(outcome.message));
      });
    }));
}
