import { Command } from 'commander';
import type { LogBuffer, FilterUiState } from '@taskdock/core';
import { parseSearchQuery, isEmptyFilter } from '@taskdock/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import { $try, withBoard, requirePriority, resolveCategoryArg, report } from '../helpers.js';

type ListOptions = GlobalOptions & {
  checked?: boolean;
  unchecked?: boolean;
  priority?: string;
  category?: string;
};

export function createListCommand(logBuffer: LogBuffer): Command {
  return new Command('list')
    .description('List tasks, optionally filtered (e.g. "status:pending priority:high fabric")')
    .argument('[query...]', 'Search text with optional status:, priority: and category: tokens')
    .option('-c, --checked', 'Show only checked tasks')
    .option('-u, --unchecked', 'Show only unchecked tasks')
    .option('-p, --priority <level>', 'Filter by priority (high, medium, low)')
    .option('--category <idOrName>', 'Filter by category id or name, or "none"')
    .action((query: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const g = cmd.optsWithGlobals<ListOptions>();

      if (g.checked && g.unchecked) {
        out.error('Cannot use both --checked and --unchecked at the same time');
        process.exitCode = 1;
        return;
      }

      await withBoard(g, logBuffer, async (board) => {
        const categories = board.getSnapshot().categories;
        const parsed = parseSearchQuery(query.join(' '), categories);
        const filter: FilterUiState = {
          ...parsed,
          completed: g.checked ? 'true' : g.unchecked ? 'false' : parsed.completed,
          priority: g.priority === undefined ? parsed.priority : requirePriority(g.priority),
          categoryId: g.category === undefined
            ? parsed.categoryId
            : String(resolveCategoryArg(g.category, categories) ?? 'none'),
        };

        // start() already loaded the unfiltered list
        if (Object.values(filter).some((v) => v !== '')) {
          if (!report(await board.setFilter(filter), () => {})) return;
        }

        const snap = board.getSnapshot();
        if (snap.rows.length === 0) {
          out.info(isEmptyFilter(board.sync.filter) ? 'No tasks yet' : 'No tasks match the filter');
          return;
        }
        out.printRows(snap.rows, snap.categories);
      });
    }));
}
