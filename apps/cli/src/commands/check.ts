import { Command } from 'commander';
import type { LogBuffer } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import { $try, withBoard, report, parseTaskId } from '../helpers.js';

function createCompletionCommand(name: string, completed: boolean, logBuffer: LogBuffer): Command {
  const verb = completed ? 'Check' : 'Uncheck';
  return new Command(name)
    .description(`${verb} one or more tasks`)
    .argument('<taskIds...>', `The id(s) of the task(s) to ${name}`)
    .action((taskIds: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const ids = taskIds.map(parseTaskId);
      await withBoard(cmd.optsWithGlobals<GlobalOptions>(), logBuffer, async (board) => {
        report(await board.sync.batchUpdate(ids, { completed }), (outcome) => out.success(outcome.message));
      });
    }));
}

export function createCheckCommand(logBuffer: LogBuffer): Command {
  return createCompletionCommand('check', true, logBuffer);
}

export function createUncheckCommand(logBuffer: LogBuffer): Command {
  return createCompletionCommand('uncheck', false, logBuffer);
}
