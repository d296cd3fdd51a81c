import { Command } from 'commander';
import type { LogBuffer } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import { $try, withBoard } from '../helpers.js';

export function createStatsCommand(logBuffer: LogBuffer): Command {
  return new Command('stats')
    .description('Show task counts by status, priority and category')
    .action((_opts: unknown, cmd: Command) => $try(async () => {
      await withBoard(cmd.optsWithGlobals<GlobalOptions>(), logBuffer, async (board) => {
        const { stats, source } = board.getSnapshot().stats;
        out.printStats(stats);
        if (source === 'local') out.warning('Server stats unavailable; counts computed from the task list');
      });
    }));
}
