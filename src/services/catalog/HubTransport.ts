/**
 * Hub transport
 *
 * The catalog client only needs three things from the dataset repository:
 * a folder listing, file sizes from that listing, and whole-file downloads.
 */

import { z } from 'zod';
import { RemoteCatalogError } from '../../lib/errors/CacheErrors.js';
import type { HubConfig } from '../../lib/env-config.js';

export interface HubTreeEntry {
  type: 'file' | 'directory';
  /** Full path inside the repository, e.g. `data/cs.AI/2024` */
  path: string;
  /** Size in bytes (0 for directories) */
  size: number;
}

export interface HubTransport {
  /** Non-recursive listing of one folder */
  listTree(pathInRepo: string): Promise<HubTreeEntry[]>;

  /** Whole-file download */
  downloadFile(pathInRepo: string): Promise<Uint8Array>;
}

const TreeResponseSchema = z.array(
  z
    .object({
      type: z.string(),
      path: z.string(),
      size: z.number().nonnegative().optional()
    })
    .passthrough()
);

/**
 * Encodes each path segment but keeps the separators
 */
function encodeRepoPath(pathInRepo: string): string {
  return pathInRepo
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
}

/**
 * Extracts the `rel="next"` target of a Link header
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  for (const part of header.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part.trim());
    if (match) return match[1];
  }
  return null;
}

/**
 * Dataset repository access over the hub's HTTP API
 */
export class FetchHubTransport implements HubTransport {
  constructor(
    private config: Pick<HubConfig, 'endpoint' | 'repoId' | 'revision' | 'token' | 'timeoutMs'>,
    private fetchImpl: typeof fetch = fetch
  ) {}

  async listTree(pathInRepo: string): Promise<HubTreeEntry[]> {
    const base = this.config.endpoint.replace(/\/+$/, '');
    let url: string | null =
      `${base}/api/datasets/${this.config.repoId}/tree/${encodeURIComponent(this.config.revision)}/${encodeRepoPath(pathInRepo)}`;

    const entries: HubTreeEntry[] = [];
    while (url) {
      const response = await this.request(url, pathInRepo);
      const body: unknown = await response.json();
      const parsed = TreeResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new RemoteCatalogError(pathInRepo, 'unexpected tree listing format');
      }

      for (const item of parsed.data) {
        if (item.type === 'directory' || item.type === 'file') {
          entries.push({ type: item.type, path: item.path, size: item.size ?? 0 });
        }
      }
      url = parseNextLink(response.headers.get('link'));
    }
    return entries;
  }

  async downloadFile(pathInRepo: string): Promise<Uint8Array> {
    const base = this.config.endpoint.replace(/\/+$/, '');
    const url = `${base}/datasets/${this.config.repoId}/resolve/${encodeURIComponent(this.config.revision)}/${encodeRepoPath(pathInRepo)}`;
    const response = await this.request(url, pathInRepo);
    return new Uint8Array(await response.arrayBuffer());
  }

  private async request(url: string, pathInRepo: string): Promise<Response> {
    const headers: Record<string, string> = {};
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers,
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch (error) {
      throw new RemoteCatalogError(pathInRepo, error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
      throw new RemoteCatalogError(pathInRepo, `HTTP ${response.status} ${response.statusText}`, response.status);
    }
    return response;
  }
}
