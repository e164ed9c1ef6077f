/**
 * Search Command
 */

import { Command } from 'commander';
import { SEARCH_DEFAULTS } from '../../constants/calibration-constants.js';
import { output } from '../utils/output.js';
import { parseSelectionOptions, withService, type ServiceRunner } from '../utils/service.js';

interface SearchCommandOptions {
  categories: string[];
  periods: string[];
  limit: number;
}

export function createSearchCommand(run: ServiceRunner = withService): Command {
  return new Command('search')
    .description('Find the papers of a selection closest in meaning to a query')
    .argument('<query...>', 'Free-text query')
    .requiredOption('-c, --categories <codes...>', 'Subject codes (comma or space separated)')
    .requiredOption('-p, --periods <yyyy-mm...>', 'Year-months, e.g. 2024-01 2024-02')
    .option('-k, --limit <count>', 'Maximum number of hits', (value) => Number(value), SEARCH_DEFAULTS.K)
    .action(async (words: string[], options: SearchCommandOptions) => {
      const selection = parseSelectionOptions(options.categories, options.periods);
      if (selection.isErr()) {
        output.error(selection.error.message);
        process.exitCode = 1;
        return;
      }

      await run(async (service) => {
        const result = await service.search.search(selection.value, words.join(' '), options.limit);
        if (result.isErr()) {
          output.error(result.error.message, result.error);
          process.exitCode = 1;
          return;
        }

        const hits = result.value;
        if (output.isJson()) {
          output.json(hits);
          return;
        }

        output.table(
          ['Score', 'arXiv ID', 'Subject', 'Title'],
          hits.map((hit) => [hit.score.toFixed(4), hit.arxivId, hit.primarySubject, hit.title])
        );
      });
    });
}
