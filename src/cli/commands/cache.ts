/**
 * Cache Command
 *
 * Shows what is already on disk.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createPartitionKey, MONTH_NAMES, MonthSchema, YearSchema } from '../../models/PartitionKey.js';
import { output, type Cell } from '../utils/output.js';
import { withService, type ServiceRunner } from '../utils/service.js';

function invalid(message: string): void {
  output.error(message);
  process.exitCode = 1;
}

export function createCacheCommand(run: ServiceRunner = withService): Command {
  const command = new Command('cache').description('Inspect the local cache');

  command
    .command('summary', { isDefault: true })
    .description('Summarize the local cache by year and month')
    .action(async () => {
      await run(async (service) => {
        const summary = await service.cache.getCacheSummary();

        if (output.isJson()) {
          output.json({ dataDir: service.cache.getDataDir(), ...summary });
          return;
        }

        if (summary.totalFiles === 0) {
          output.info('Cache is empty', { dataDir: service.cache.getDataDir() });
          return;
        }

        const rows: Cell[][] = [];
        for (const [year, yearData] of Object.entries(summary.years)) {
          for (const [month, monthData] of Object.entries(yearData.months)) {
            rows.push([year, MONTH_NAMES[Number(month) - 1] ?? month, monthData.subjects, monthData.papers]);
          }
        }
        output.table(['Year', 'Month', 'Subjects', 'Papers'], rows);

        console.log();
        console.log(
          `${chalk.bold('Total:')} ${summary.totalPapers} papers in ${summary.totalFiles} file(s)`
        );
      });
    });

  command
    .command('years')
    .description('List years with cached data')
    .action(async () => {
      await run(async (service) => {
        output.list(await service.cache.listCachedYears());
      });
    });

  command
    .command('months')
    .description('List cached months of a year')
    .argument('<year>', 'Four-digit year')
    .action(async (year: string) => {
      if (!YearSchema.safeParse(year).success) {
        invalid(`Invalid year: ${year}`);
        return;
      }
      await run(async (service) => {
        output.list(await service.cache.listCachedMonths(year));
      });
    });

  command
    .command('subjects')
    .description('List cached subjects of a month')
    .argument('<year>', 'Four-digit year')
    .argument('<month>', 'Two-digit month')
    .action(async (year: string, month: string) => {
      if (!YearSchema.safeParse(year).success || !MonthSchema.safeParse(month).success) {
        invalid(`Invalid year or month: ${year}-${month}`);
        return;
      }
      await run(async (service) => {
        output.list(await service.cache.listCachedSubjects(year, month));
      });
    });

  command
    .command('count')
    .description('Exact paper count of one cached partition')
    .argument('<subject>', 'Subject code, e.g. cs.AI')
    .argument('<year>', 'Four-digit year')
    .argument('<month>', 'Two-digit month')
    .action(async (subject: string, year: string, month: string) => {
      const key = createPartitionKey(subject, year, month);
      if (key.isErr()) {
        invalid(key.error.message);
        return;
      }
      await run(async (service) => {
        const cached = service.cache.isCached(key.value);
        const papers = await service.cache.getCachedCount(key.value);
        output.info(`${papers} paper(s) cached for ${subject} ${year}-${month}`, { cached, papers });
      });
    });

  return command;
}
