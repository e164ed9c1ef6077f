/**
 * Download Commands
 *
 * `download` fetches one (subject, year, month) partition; `download-month`
 * builds the all-subjects file for a month.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createPartitionKey, MonthSchema, YearSchema } from '../../models/PartitionKey.js';
import { output } from '../utils/output.js';
import { splitList, withService } from '../utils/service.js';

interface DownloadCommandOptions {
  force?: boolean;
}

interface DownloadMonthCommandOptions extends DownloadCommandOptions {
  subjects?: string[];
}

export function createDownloadCommand(): Command {
  return new Command('download')
    .description('Download one subject partition into the local cache')
    .argument('<subject>', 'Subject code, e.g. cs.AI')
    .argument('<year>', 'Four-digit year')
    .argument('<month>', 'Two-digit month')
    .option('-f, --force', 'Re-fetch even when cached')
    .action(async (subject: string, year: string, month: string, options: DownloadCommandOptions) => {
      const key = createPartitionKey(subject, year, month);
      if (key.isErr()) {
        output.error(key.error.message);
        process.exitCode = 1;
        return;
      }

      await withService(async (service) => {
        const path = await service.orchestrator.downloadAndCache(key.value, {
          force: options.force,
          onProgress: (_current, _total, message) => {
            if (!output.isJson()) {
              console.log(chalk.dim(message));
            }
          }
        });

        if (path === null) {
          output.error(`No data for ${subject} ${year}-${month}`);
          process.exitCode = 1;
          return;
        }

        const papers = await service.cache.getCachedCount(key.value);
        output.success(`Cached ${subject} ${year}-${month}`, { path, papers });
      });
    });
}

export function createDownloadMonthCommand(): Command {
  return new Command('download-month')
    .description('Download every subject of a month into one combined file')
    .argument('<year>', 'Four-digit year')
    .argument('<month>', 'Two-digit month')
    .option('-f, --force', 'Re-fetch even when cached')
    .option('-s, --subjects <codes...>', 'Restrict to these subjects (comma or space separated)')
    .action(async (year: string, month: string, options: DownloadMonthCommandOptions) => {
      if (!YearSchema.safeParse(year).success || !MonthSchema.safeParse(month).success) {
        output.error(`Invalid year/month: ${year}-${month}`);
        process.exitCode = 1;
        return;
      }

      const subjects = splitList(options.subjects);

      await withService(async (service) => {
        const result = await service.orchestrator.downloadMonth(year, month, {
          force: options.force,
          subjects: subjects.length > 0 ? subjects : undefined,
          onProgress: (current, total, message) => {
            if (!output.isJson()) {
              console.log(chalk.dim(`[${current}/${total}] ${message}`));
            }
          }
        });

        if (!result) {
          output.error(`No data found for ${year}-${month}`);
          process.exitCode = 1;
          return;
        }

        output.success(`${result.fromCache ? 'Already cached' : 'Downloaded'} ${year}-${month}`, {
          path: result.path,
          papers: result.papers,
          failedSubjects: result.failed.length > 0 ? result.failed.join(', ') : undefined
        });
      });
    });
}
