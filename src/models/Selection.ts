import { createHash } from 'crypto';
import { z } from 'zod';
import { Result, ok, err } from '../lib/result-types.js';
import { InvalidRequestError } from '../lib/errors/CacheErrors.js';
import { MonthSchema, SubjectSchema, YearSchema, type PartitionKey } from './PartitionKey.js';

export interface YearMonth {
  year: string;
  month: string;
}

/**
 * A set of subjects crossed with a list of year-months
 */
export interface Selection {
  categories: string[];
  yearMonths: YearMonth[];
}

export const YearMonthSchema = z.object({ year: YearSchema, month: MonthSchema });

export const SelectionSchema = z.object({
  categories: z.array(SubjectSchema).min(1, 'select at least one category'),
  yearMonths: z.array(YearMonthSchema).min(1, 'select at least one month')
});

export const FINGERPRINT_LENGTH = 12;

export function formatYearMonth(ym: YearMonth): string {
  return `${ym.year}-${ym.month}`;
}

/**
 * Parses `YYYY-MM`
 */
export function parseYearMonth(value: string): Result<YearMonth, InvalidRequestError> {
  const match = /^(\d{4})-(\d{2})$/.exec(value.trim());
  if (!match) {
    return err(new InvalidRequestError('yearMonth', `expected YYYY-MM, got "${value}"`));
  }
  const parsed = YearMonthSchema.safeParse({ year: match[1], month: match[2] });
  if (!parsed.success) {
    return err(new InvalidRequestError('yearMonth', parsed.error.issues[0]?.message ?? value));
  }
  return ok(parsed.data);
}

/**
 * Validates the shape of a selection
 */
export function validateSelection(input: unknown): Result<Selection, InvalidRequestError> {
  const parsed = SelectionSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(new InvalidRequestError(issue?.path.join('.') || 'selection', issue?.message ?? 'invalid selection'));
  }
  return ok(parsed.data);
}

/**
 * Sorted, de-duplicated form used for hashing and iteration
 */
export function canonicalizeSelection(selection: Selection): { categories: string[]; yearMonths: string[] } {
  return {
    categories: [...new Set(selection.categories)].sort(),
    yearMonths: [...new Set(selection.yearMonths.map(formatYearMonth))].sort()
  };
}

/**
 * Order-invariant cache key for derived results
 */
export function selectionFingerprint(selection: Selection): string {
  const canonical = canonicalizeSelection(selection);
  return createHash('sha256')
    .update(JSON.stringify(canonical))
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
}

/**
 * Cross product of categories and year-months, in canonical order
 */
export function expandSelection(selection: Selection): PartitionKey[] {
  const canonical = canonicalizeSelection(selection);
  const keys: PartitionKey[] = [];
  for (const category of canonical.categories) {
    for (const ym of canonical.yearMonths) {
      const [year, month] = ym.split('-');
      keys.push({ subject: category, year, month });
    }
  }
  return keys;
}
