/**
 * Embedding collaborator
 *
 * Turns paper texts into vectors. The derived-result cache only depends on
 * the `Embedder` interface; `HostedEmbedder` talks to any OpenAI-compatible
 * `/embeddings` endpoint.
 */

import { z } from 'zod';
import type { EmbeddingConfig } from '../../lib/env-config.js';

export interface Embedder {
  /** Model identifier; cached embeddings are partitioned by it */
  readonly modelId: string;

  /**
   * One vector per input text, in input order. Rejects on failure.
   */
  embed(texts: string[]): Promise<number[][]>;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()).min(1)
    })
  )
});

/**
 * Hosted embedding endpoint client
 */
export class HostedEmbedder implements Embedder {
  readonly modelId: string;
  private endpoint?: string;
  private apiKey?: string;

  constructor(
    config: Pick<EmbeddingConfig, 'modelId' | 'endpoint' | 'apiKey'>,
    private fetchImpl: typeof fetch = fetch,
    private timeoutMs: number = 60000
  ) {
    this.modelId = config.modelId;
    this.endpoint = config.endpoint?.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    if (!this.endpoint) {
      throw new Error('EMBED_ENDPOINT is not configured');
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const response = await this.fetchImpl(`${this.endpoint}/embeddings`, {
      method: 'POST',
      headers,
      body: JSON.stringify({ model: this.modelId, input: texts }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected embeddings response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }
    if (parsed.data.data.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, got ${parsed.data.data.length}`);
    }

    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
