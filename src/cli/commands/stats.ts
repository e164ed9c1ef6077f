/**
 * Stats Command
 */

import { Command } from 'commander';
import { output } from '../utils/output.js';
import { parseSelectionOptions, withService, type ServiceRunner } from '../utils/service.js';

interface StatsCommandOptions {
  categories: string[];
  periods: string[];
}

export function createStatsCommand(run: ServiceRunner = withService): Command {
  return new Command('stats')
    .description('Paper total and top subjects of an embedded selection')
    .requiredOption('-c, --categories <codes...>', 'Subject codes (comma or space separated)')
    .requiredOption('-p, --periods <yyyy-mm...>', 'Year-months, e.g. 2024-01 2024-02')
    .action(async (options: StatsCommandOptions) => {
      const selection = parseSelectionOptions(options.categories, options.periods);
      if (selection.isErr()) {
        output.error(selection.error.message);
        process.exitCode = 1;
        return;
      }

      await run(async (service) => {
        const stats = await service.getStats(selection.value);
        if (output.isJson()) {
          output.json(stats);
          return;
        }

        if (stats.totalPapers === 0) {
          output.warning('No embedded papers for this selection');
          return;
        }
        output.info(`${stats.totalPapers} embedded paper(s)`);
        output.table(
          ['Primary subject', 'Papers'],
          stats.topSubjects.map((subject) => [subject.primarySubject, subject.count])
        );
      });
    });
}
