/**
 * Estimate Command
 *
 * Paper counts and processing time for a selection, from the local cache
 * where possible and from remote file sizes otherwise.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { MonthSchema, YearSchema } from '../../models/PartitionKey.js';
import { output } from '../utils/output.js';
import { splitList, withService } from '../utils/service.js';

interface EstimateCommandOptions {
  categories: string[];
  months?: string[];
}

export function createEstimateCommand(): Command {
  return new Command('estimate')
    .description('Estimate paper count and processing time for a selection')
    .argument('<year>', 'Four-digit year')
    .requiredOption('-c, --categories <codes...>', 'Subject codes (comma or space separated)')
    .option('-m, --months <months...>', 'Two-digit months (default: every month of the year)')
    .action(async (year: string, options: EstimateCommandOptions) => {
      const categories = splitList(options.categories);
      const months = splitList(options.months);

      const badMonth = months.find((month) => !MonthSchema.safeParse(month).success);
      if (!YearSchema.safeParse(year).success || badMonth !== undefined) {
        output.error(`Invalid year or month: ${badMonth ?? year}`);
        process.exitCode = 1;
        return;
      }

      await withService(async (service) => {
        const estimate = await service.estimator.estimateSelection(categories, year, months);

        if (output.isJson()) {
          output.json(estimate);
          return;
        }

        output.table(
          ['Category', 'Cached', 'Estimated', 'Total'],
          Object.entries(estimate.byCategory).map(([code, counts]) => [
            code,
            counts.cached,
            counts.estimated,
            counts.total
          ])
        );

        console.log();
        console.log(
          `${chalk.bold('Papers:')} ${estimate.total} ` +
            chalk.dim(`(${estimate.totalCached} cached in ${estimate.cachedFiles} file(s), ` +
              `~${estimate.totalEstimated} estimated for ${estimate.estimatedFiles})`)
        );
        console.log(`${chalk.bold('GPU:')} ${estimate.timeEstimate.gpu.formatted}`);
        console.log(`${chalk.bold('CPU:')} ${estimate.timeEstimate.cpu.formatted}`);
      });
    });
}
