import { z } from 'zod';

/**
 * One paper row. Only the identifier is required; every other column of the
 * source dataset passes through untouched.
 */
export const PaperRecordSchema = z
  .object({
    arxiv_id: z.string().min(1),
    title: z.string().nullish(),
    abstract: z.string().nullish(),
    primary_subject: z.string().nullish(),
    subjects: z.string().nullish(),
    submission_date: z.string().nullish()
  })
  .passthrough();

export type PaperRecord = z.infer<typeof PaperRecordSchema>;

/**
 * A paper with its embedding vector
 */
export const EmbeddedPaperSchema = PaperRecordSchema.extend({
  embedding: z.array(z.number()).min(1),
  year_month: z.string()
});

export type EmbeddedPaper = z.infer<typeof EmbeddedPaperSchema>;

/**
 * A paper placed on the 2D projection (the vector itself is not kept)
 */
export const ProjectedPaperSchema = PaperRecordSchema.extend({
  year_month: z.string(),
  x: z.number(),
  y: z.number()
});

export type ProjectedPaper = z.infer<typeof ProjectedPaperSchema>;

/**
 * Keeps the first row per arxiv_id, preserving order
 */
export function dedupeByArxivId<T extends { arxiv_id: string }>(records: Iterable<T>): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const record of records) {
    if (seen.has(record.arxiv_id)) continue;
    seen.add(record.arxiv_id);
    unique.push(record);
  }
  return unique;
}

/**
 * Title + abstract, cut to the model's character budget
 */
export function buildEmbeddingText(record: PaperRecord, budget: number): string {
  const text = `${record.title ?? ''} ${record.abstract ?? ''}`;
  return text.slice(0, budget);
}
