import { STATS_DEFAULTS } from '../../constants/calibration-constants.js';
import type { PaperRecord } from '../../models/PaperRecord.js';

export interface SubjectCount {
  primarySubject: string;
  count: number;
}

export interface SelectionStats {
  totalPapers: number;
  topSubjects: SubjectCount[];
}

export const UNKNOWN_SUBJECT = 'Unknown';

/**
 * Paper total and the most frequent primary subjects, largest first
 */
export function computeSelectionStats(
  rows: readonly PaperRecord[],
  limit: number = STATS_DEFAULTS.TOP_SUBJECTS
): SelectionStats {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const subject = row.primary_subject || UNKNOWN_SUBJECT;
    counts.set(subject, (counts.get(subject) ?? 0) + 1);
  }

  const topSubjects = [...counts]
    .map(([primarySubject, count]) => ({ primarySubject, count }))
    .sort((a, b) => b.count - a.count || a.primarySubject.localeCompare(b.primarySubject))
    .slice(0, limit);

  return { totalPapers: rows.length, topSubjects };
}
