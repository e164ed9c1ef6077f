/**
 * Subjects Command
 */

import { Command } from 'commander';
import { output } from '../utils/output.js';
import { withService } from '../utils/service.js';

export function createSubjectsCommand(): Command {
  return new Command('subjects')
    .description('Show the subject code map (computed once, then read from disk)')
    .action(async () => {
      await withService(async (service) => {
        const codes = await service.subjects.getSubjectCodes();
        const entries = Object.entries(codes).sort(([a], [b]) => a.localeCompare(b));

        if (entries.length === 0) {
          output.warning('No subjects found upstream');
          return;
        }

        output.table(['Code', 'Name'], entries);
      });
    });
}
