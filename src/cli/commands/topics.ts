/**
 * Topics Command
 *
 * Extracts topics from the embedded papers of a selection, reusing a cached
 * result while the selection still holds the same papers.
 */

import { Command } from 'commander';
import ora from 'ora';
import { TOPIC_DEFAULTS } from '../../constants/calibration-constants.js';
import { output, type Cell } from '../utils/output.js';
import { parseSelectionOptions, withService, type ServiceRunner } from '../utils/service.js';

interface TopicsCommandOptions {
  categories: string[];
  periods: string[];
  count: number;
  status?: boolean;
}

/** Terms shown per topic in the table */
const TERMS_SHOWN = 5;

export function createTopicsCommand(run: ServiceRunner = withService): Command {
  return new Command('topics')
    .description('Extract topics from the embedded papers of a selection')
    .requiredOption('-c, --categories <codes...>', 'Subject codes (comma or space separated)')
    .requiredOption('-p, --periods <yyyy-mm...>', 'Year-months, e.g. 2024-01 2024-02')
    .option('-n, --count <topics>', 'Number of topics', (value) => Number(value), TOPIC_DEFAULTS.N_COMPONENTS)
    .option('--status', 'Only report whether topics can be extracted')
    .action(async (options: TopicsCommandOptions) => {
      const selection = parseSelectionOptions(options.categories, options.periods);
      if (selection.isErr()) {
        output.error(selection.error.message);
        process.exitCode = 1;
        return;
      }

      await run(async (service) => {
        if (options.status) {
          const status = await service.topics.getStatus(selection.value);
          if (output.isJson()) {
            output.json(status);
          } else if (status.available) {
            output.info(`${status.paperCount} embedded paper(s)`, { suggestedTopics: status.suggestedTopics });
          } else {
            output.warning('No embedded papers for this selection');
          }
          return;
        }

        const spinner = output.isJson() ? null : ora(`Extracting ${options.count} topics`).start();
        const result = await service.topics.extractTopics(selection.value, options.count);

        if (result.isErr()) {
          spinner?.fail(result.error.message);
          if (!spinner) {
            output.error(result.error.message, result.error);
          }
          process.exitCode = 1;
          return;
        }

        const outcome = result.value;
        if (output.isJson()) {
          output.json(outcome);
          return;
        }

        spinner?.succeed(
          `${outcome.topics.length} topics over ${outcome.paperCount} papers${outcome.fromCache ? ' (cached)' : ''}`
        );
        const rows: Cell[][] = outcome.topics.map((topic) => [
          topic.id,
          topic.docCount,
          topic.terms
            .slice(0, TERMS_SHOWN)
            .map((term) => term.term)
            .join(', ')
        ]);
        output.table(['Topic', 'Papers', 'Terms'], rows);
      });
    });
}
