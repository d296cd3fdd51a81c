#!/usr/bin/env node

import { Command } from 'commander';
import { LogBuffer } from '@taskdock/core';
import type { GlobalOptions } from './helpers.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createEditCommand } from './commands/edit.js';
import { createPriorityCommand } from './commands/priority.js';
import { createDeleteCommand } from './commands/delete.js';
import { createMoveCommand } from './commands/move.js';
import { createCategoriesCommand } from './commands/categories.js';
import { createStatsCommand } from './commands/stats.js';
import { createServeCommand } from './commands/serve.js';

// Session logs stay in memory unless --verbose
const logBuffer = new LogBuffer({ echo: 'silent' });

const program = new Command()
  .name('taskdock')
  .description('Task list client for a taskdock server')
  .version('1.0.0')
  .option('--url <url>', 'Server base URL (default: TASKDOCK_URL or http://127.0.0.1:5000)')
  .option('-v, --verbose', 'Print request and sync logs')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().verbose) logBuffer.setEcho('debug');
  });

program.addCommand(createListCommand(logBuffer), { isDefault: true });
program.addCommand(createShowCommand(logBuffer));
program.addCommand(createAddCommand(logBuffer));
program.addCommand(createEditCommand(logBuffer));
program.addCommand(createCheckCommand(logBuffer));
program.addCommand(createUncheckCommand(logBuffer));
program.addCommand(createPriorityCommand(logBuffer));
program.addCommand(createDeleteCommand(logBuffer));
program.addCommand(createMoveCommand(logBuffer));
program.addCommand(createCategoriesCommand(logBuffer));
program.addCommand(createStatsCommand(logBuffer));
program.addCommand(createServeCommand(logBuffer));

await program.parseAsync();
