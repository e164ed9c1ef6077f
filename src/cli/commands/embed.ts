/**
 * Embed Command
 *
 * Downloads, embeds and projects a selection, reusing whatever stage is
 * already cached.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { output } from '../utils/output.js';
import { parseSelectionOptions, withService, type ServiceRunner } from '../utils/service.js';

interface EmbedCommandOptions {
  categories: string[];
  periods: string[];
}

export function createEmbedCommand(run: ServiceRunner = withService): Command {
  return new Command('embed')
    .description('Embed and project a selection of categories and months')
    .requiredOption('-c, --categories <codes...>', 'Subject codes (comma or space separated)')
    .requiredOption('-p, --periods <yyyy-mm...>', 'Year-months, e.g. 2024-01 2024-02')
    .action(async (options: EmbedCommandOptions) => {
      const selection = parseSelectionOptions(options.categories, options.periods);
      if (selection.isErr()) {
        output.error(selection.error.message);
        process.exitCode = 1;
        return;
      }

      await run(async (service) => {
        const spinner = output.isJson() ? null : ora('Preparing selection').start();

        const result = await service.embedSelection(selection.value, (current, total, message) => {
          if (spinner) {
            spinner.text = `${message} ${chalk.dim(`(${current}/${total})`)}`;
          }
        });

        if (result.isErr()) {
          spinner?.fail(result.error.message);
          if (!spinner) {
            output.error(result.error.message, result.error);
          }
          process.exitCode = 1;
          return;
        }

        const { rows, fingerprint, fromCache, embedded, downloads } = result.value;
        spinner?.succeed(`Projected ${rows.length} papers${fromCache ? ' (cached)' : ''}`);

        output.success('Selection ready', {
          fingerprint,
          papers: rows.length,
          embedded,
          downloaded: downloads.downloaded,
          alreadyCached: downloads.alreadyCached,
          failedPartitions: downloads.failed.length,
          projection: service.projections.getProjectionPath(selection.value)
        });
      });
    });
}
