/**
 * Catalog Command
 *
 * Browses what the dataset repository holds without downloading anything.
 */

import { Command } from 'commander';
import { createPartitionKey } from '../../models/PartitionKey.js';
import { output } from '../utils/output.js';
import { withService, type ServiceRunner } from '../utils/service.js';

interface CatalogCommandOptions {
  subject?: string;
  year?: string;
}

export function createCatalogCommand(run: ServiceRunner = withService): Command {
  const command = new Command('catalog')
    .description('List subjects, years or months available upstream')
    .option('-s, --subject <code>', 'Subject code, e.g. cs.AI')
    .option('-y, --year <year>', 'Four-digit year')
    .action(async (options: CatalogCommandOptions) => {
      await run(async (service) => {
        const { subject, year } = options;

        if (subject && year) {
          const months = await service.catalog.listMonthsForSubjectYear(subject, year);
          output.info(`${months.length} month(s) for ${subject} in ${year}`);
          output.list(months);
        } else if (subject) {
          const years = await service.catalog.listYearsForSubject(subject);
          output.info(`${years.length} year(s) for ${subject}`);
          output.list(years);
        } else if (year) {
          const months = await service.catalog.listAvailableMonths(year);
          output.info(`${months.length} month(s) available in ${year}`);
          output.list(months);
        } else {
          const subjects = await service.catalog.listSubjects();
          output.info(`${subjects.length} subject(s) available`);
          output.list(subjects);
        }
      });
    });

  command
    .command('info')
    .description('Show the remote file behind one partition')
    .argument('<subject>', 'Subject code, e.g. cs.AI')
    .argument('<year>', 'Four-digit year')
    .argument('<month>', 'Two-digit month')
    .action(async (subject: string, year: string, month: string) => {
      const key = createPartitionKey(subject, year, month);
      if (key.isErr()) {
        output.error(key.error.message);
        process.exitCode = 1;
        return;
      }

      await run(async (service) => {
        const info = await service.catalog.getFileInfo(key.value);
        if (!info) {
          output.warning(`No remote file for ${subject} ${year}-${month}`);
          return;
        }
        output.info(`Remote file for ${subject} ${year}-${month}`, { path: info.path, sizeBytes: info.sizeBytes });
      });
    });

  return command;
}
