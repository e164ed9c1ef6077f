import { join } from 'path';
import { z } from 'zod';
import { Result, ok, err } from '../lib/result-types.js';
import { InvalidRequestError } from '../lib/errors/CacheErrors.js';

/**
 * One (subject, year, month) granule of the source dataset.
 *
 * Years and months stay zero-padded strings so that paths can be built by
 * concatenation.
 */
export interface PartitionKey {
  readonly subject: string;
  readonly year: string;
  readonly month: string;
}

export const YearSchema = z.string().regex(/^\d{4}$/, 'year must be four digits');
export const MonthSchema = z.string().regex(/^(0[1-9]|1[0-2])$/, 'month must be 01..12');
export const SubjectSchema = z
  .string()
  .min(1, 'subject must not be empty')
  .refine((s) => !s.includes('/') && !s.includes('\\'), 'subject must not contain path separators');

export const PartitionKeySchema = z.object({
  subject: SubjectSchema,
  year: YearSchema,
  month: MonthSchema
});

export const MONTH_NAMES = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'
] as const;

/**
 * Validates and freezes a partition key
 */
export function createPartitionKey(
  subject: string,
  year: string,
  month: string
): Result<PartitionKey, InvalidRequestError> {
  const parsed = PartitionKeySchema.safeParse({ subject, year, month });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'partition';
    return err(new InvalidRequestError(field, issue?.message ?? 'invalid partition key'));
  }
  return ok(Object.freeze({ ...parsed.data }));
}

/**
 * Human-readable key, e.g. `cs.AI/2024-03`
 */
export function describePartition(key: PartitionKey): string {
  return `${key.subject}/${key.year}-${key.month}`;
}

// ============================================================================
// Path model
// ============================================================================

/**
 * Replaces the dot in subject codes so a code fits in one path segment
 */
export function safeSubject(subject: string): string {
  return subject.replace(/\./g, '_');
}

/**
 * Best-effort reverse of safeSubject for listings
 */
export function subjectFromSafe(safe: string): string {
  return safe.replace(/_/g, '.');
}

/**
 * Turns a model id like `org/model` into a single path segment
 */
export function modelSlug(modelId: string): string {
  return modelId.replace(/[^A-Za-z0-9._-]+/g, '_');
}

export const RECORD_EXTENSION = 'jsonl';

/**
 * `<dataDir>/<year>/<month>/<safe-subject>.jsonl`
 */
export function partitionPath(dataDir: string, key: PartitionKey): string {
  return join(dataDir, key.year, key.month, `${safeSubject(key.subject)}.${RECORD_EXTENSION}`);
}

/**
 * `<dataDir>/arxiv_<year>_<month>.jsonl`
 */
export function monthAggregatePath(dataDir: string, year: string, month: string): string {
  return join(dataDir, `arxiv_${year}_${month}.${RECORD_EXTENSION}`);
}

/**
 * `<embeddingsDir>/<model>/<year>/<month>/<safe-subject>.jsonl`
 */
export function embeddingPartitionPath(
  embeddingsDir: string,
  modelId: string,
  key: PartitionKey
): string {
  return join(
    embeddingsDir,
    modelSlug(modelId),
    key.year,
    key.month,
    `${safeSubject(key.subject)}.${RECORD_EXTENSION}`
  );
}

/**
 * `<projectionsDir>/<model>/projection_<fingerprint>.json`
 */
export function projectionPath(projectionsDir: string, modelId: string, fingerprint: string): string {
  return join(projectionsDir, modelSlug(modelId), `projection_${fingerprint}.json`);
}

/**
 * `<topicsDir>/<model>/topics_<key>.json`
 */
export function topicsPath(topicsDir: string, modelId: string, cacheKey: string): string {
  return join(topicsDir, modelSlug(modelId), `topics_${cacheKey}.json`);
}

/**
 * Path of the partition file inside the dataset repository
 */
export function remotePartitionPath(key: PartitionKey): string {
  return `data/${key.subject}/${key.year}/${key.month}/00000000.parquet`;
}

/**
 * Directory layout under one cache root
 */
export interface CacheLayout {
  root: string;
  dataDir: string;
  hubLandingDir: string;
  embeddingsDir: string;
  projectionsDir: string;
  topicsDir: string;
  metaDir: string;
  subjectCodesFile: string;
}

export function createCacheLayout(root: string): CacheLayout {
  const dataDir = join(root, 'data');
  const metaDir = join(root, 'cache');
  return {
    root,
    dataDir,
    hubLandingDir: join(dataDir, '.hub_cache'),
    embeddingsDir: join(root, 'embeddings'),
    projectionsDir: join(root, 'projections'),
    topicsDir: join(root, 'topics'),
    metaDir,
    subjectCodesFile: join(metaDir, 'subject_codes.json')
  };
}

// ============================================================================
// Calendar helpers
// ============================================================================

/**
 * Current year and zero-padded month
 */
export function currentYearMonth(now: Date = new Date()): { year: string; month: string } {
  return {
    year: String(now.getFullYear()),
    month: String(now.getMonth() + 1).padStart(2, '0')
  };
}

export function isCurrentYearMonth(year: string, month: string, now: Date = new Date()): boolean {
  const current = currentYearMonth(now);
  return current.year === year && current.month === month;
}

/**
 * Months that can hold data for a year: January to the current month for
 * the current year, all twelve otherwise.
 */
export function monthsForYear(year: string, now: Date = new Date()): string[] {
  const current = currentYearMonth(now);
  const last = year === current.year ? Number(current.month) : 12;
  return Array.from({ length: last }, (_, i) => String(i + 1).padStart(2, '0'));
}

// ============================================================================
// Subject metadata parsing
// ============================================================================

const SUBJECT_LABEL_PATTERN = /^(.+?)\s*\(([a-z-]+\.[A-Z]+)\)$/;

/**
 * `"Artificial Intelligence (cs.AI)"` -> `"cs.AI"`
 */
export function extractSubjectCode(primarySubject: string | null | undefined): string | null {
  if (!primarySubject) return null;
  const match = /\(([a-z-]+\.[A-Z]+)\)/.exec(primarySubject);
  return match ? match[1] : null;
}

/**
 * `"Artificial Intelligence (cs.AI); Machine Learning (cs.LG)"` -> code/name pairs
 */
export function parseSubjectLabels(subjects: string): Array<{ code: string; name: string }> {
  const labels: Array<{ code: string; name: string }> = [];
  for (const part of subjects.split(';')) {
    const match = SUBJECT_LABEL_PATTERN.exec(part.trim());
    if (match) {
      labels.push({ code: match[2], name: match[1].trim() });
    }
  }
  return labels;
}

/**
 * `"18 Feb 2009"` -> `{ year: "2009", month: "02" }`
 */
export function extractYearMonth(submissionDate: string | null | undefined): { year: string; month: string } | null {
  if (!submissionDate) return null;
  const match = /(\d{1,2})\s+(\w{3})\s+(\d{4})/.exec(submissionDate);
  if (!match) return null;
  const index = MONTH_NAMES.findIndex((name) => name === match[2]);
  if (index < 0) return null;
  return { year: match[3], month: String(index + 1).padStart(2, '0') };
}
