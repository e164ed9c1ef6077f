import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import CircuitBreaker from 'opossum';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { RemoteCatalogError } from '../../lib/errors/CacheErrors.js';
import { remotePartitionPath, type PartitionKey } from '../../models/PartitionKey.js';
import type { HubTransport, HubTreeEntry } from './HubTransport.js';

/**
 * Size and location of one remote partition file
 */
export interface RemoteFileInfo {
  sizeBytes: number;
  path: string;
}

export interface CircuitBreakerSettings {
  errorThresholdPercentage: number;
  resetTimeout: number;
  rollingCountTimeout: number;
  rollingCountBuckets: number;
  volumeThreshold: number;
}

export const DEFAULT_BREAKER_SETTINGS: CircuitBreakerSettings = {
  errorThresholdPercentage: 50, // Open after 50% failure rate
  resetTimeout: 60000, // Try again after 1 minute
  rollingCountTimeout: 10000, // 10s rolling window
  rollingCountBuckets: 10,
  volumeThreshold: 5
};

export interface RemoteCatalogOptions {
  /** Where downloaded files land before they are stored in the cache */
  landingDir: string;
  logger?: Logger;
  breaker?: Partial<CircuitBreakerSettings>;
}

/**
 * Outcome of one listing call; only definitive answers are memoized
 */
interface ListingOutcome {
  entries: HubTreeEntry[];
  definitive: boolean;
}

const DATA_ROOT = 'data';

function lastSegment(path: string): string {
  const parts = path.split('/');
  return parts[parts.length - 1];
}

/**
 * RemoteCatalogClient - browses and downloads the partitioned dataset
 *
 * Every listing failure degrades to an empty result and every download
 * failure to `null`; callers always have the "nothing available" fallback.
 * Listings and file info are memoized for the lifetime of the instance and
 * never expire on their own; `clearCache()` forces a refresh.
 */
export class RemoteCatalogClient {
  private subjects: string[] | null = null;
  private years = new Map<string, string[]>();
  private months = new Map<string, string[]>();
  private fileInfo = new Map<string, RemoteFileInfo | null>();

  private listBreaker: CircuitBreaker<[string], HubTreeEntry[]>;
  private downloadBreaker: CircuitBreaker<[string], Uint8Array>;
  private logger: Logger;
  private landingDir: string;

  constructor(private transport: HubTransport, options: RemoteCatalogOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.landingDir = options.landingDir;

    const settings = { ...DEFAULT_BREAKER_SETTINGS, ...options.breaker };
    const breakerOptions = {
      ...settings,
      // The transport enforces its own request timeout
      timeout: false as const,
      // A missing folder is an answer, not a failure
      errorFilter: (error: unknown) => error instanceof RemoteCatalogError && error.isNotFound()
    };

    this.listBreaker = new CircuitBreaker(
      async (path: string) => this.transport.listTree(path),
      { ...breakerOptions, name: 'hub-listing' }
    );
    this.downloadBreaker = new CircuitBreaker(
      async (path: string) => this.transport.downloadFile(path),
      { ...breakerOptions, name: 'hub-download' }
    );

    for (const breaker of [this.listBreaker, this.downloadBreaker]) {
      breaker.on('open', () => {
        this.logger.warn('Circuit breaker opened - hub requests failing', { breaker: breaker.name });
      });
      breaker.on('close', () => {
        this.logger.info('Circuit breaker closed - hub recovered', { breaker: breaker.name });
      });
    }
  }

  /**
   * Subject codes under `data/`, sorted
   */
  async listSubjects(): Promise<string[]> {
    if (this.subjects) {
      return [...this.subjects];
    }

    const outcome = await this.list(DATA_ROOT, 'list_subjects');
    const subjects = this.folderNames(outcome.entries);
    if (outcome.definitive) {
      this.subjects = [...subjects];
    }
    return subjects;
  }

  /**
   * Years available for one subject, sorted
   */
  async listYearsForSubject(subject: string): Promise<string[]> {
    const cached = this.years.get(subject);
    if (cached) {
      return [...cached];
    }

    const outcome = await this.list(`${DATA_ROOT}/${subject}`, 'list_years_for_subject');
    const years = this.folderNames(outcome.entries);
    if (outcome.definitive) {
      this.years.set(subject, [...years]);
    }
    return years;
  }

  /**
   * Months available for one subject and year, sorted
   */
  async listMonthsForSubjectYear(subject: string, year: string): Promise<string[]> {
    const cacheKey = `${subject}/${year}`;
    const cached = this.months.get(cacheKey);
    if (cached) {
      return [...cached];
    }

    const outcome = await this.list(`${DATA_ROOT}/${subject}/${year}`, 'list_months_for_subject_year');
    const months = this.folderNames(outcome.entries);
    if (outcome.definitive) {
      this.months.set(cacheKey, [...months]);
    }
    return months;
  }

  /**
   * Years on the hub, taken from the first subject of the catalog
   */
  async listAvailableYears(): Promise<string[]> {
    const subjects = await this.listSubjects();
    if (subjects.length === 0) {
      return [];
    }
    return this.listYearsForSubject(subjects[0]);
  }

  /**
   * Months on the hub for a year, taken from the first subject of the catalog
   */
  async listAvailableMonths(year: string): Promise<string[]> {
    const subjects = await this.listSubjects();
    if (subjects.length === 0) {
      return [];
    }
    return this.listMonthsForSubjectYear(subjects[0], year);
  }

  /**
   * Size of a partition file without downloading it, or null when absent
   */
  async getFileInfo(key: PartitionKey): Promise<RemoteFileInfo | null> {
    const cacheKey = `${key.subject}/${key.year}/${key.month}`;
    if (this.fileInfo.has(cacheKey)) {
      return this.fileInfo.get(cacheKey) ?? null;
    }

    const outcome = await this.list(`${DATA_ROOT}/${cacheKey}`, 'get_file_info');
    const file = outcome.entries.find((entry) => entry.type === 'file' && entry.path.endsWith('.parquet'));
    const info = file ? { sizeBytes: file.size, path: file.path } : null;

    if (outcome.definitive) {
      this.fileInfo.set(cacheKey, info);
    }
    return info;
  }

  /**
   * Downloads one partition file into the landing area.
   * Returns the local path, or null when the download failed.
   */
  async downloadPartition(key: PartitionKey): Promise<string | null> {
    const remotePath = remotePartitionPath(key);
    const localPath = join(this.landingDir, ...remotePath.split('/'));

    try {
      const bytes = await this.downloadBreaker.fire(remotePath);
      await fs.mkdir(dirname(localPath), { recursive: true });
      await fs.writeFile(localPath, bytes);
      this.logger.debug('Downloaded partition', { remotePath, bytes: bytes.byteLength });
      return localPath;
    } catch (error) {
      this.logger.logRemoteError('download_partition', error, { remotePath, level: 'error' });
      return null;
    }
  }

  /**
   * Forget every memoized listing
   */
  clearCache(): void {
    this.subjects = null;
    this.years.clear();
    this.months.clear();
    this.fileInfo.clear();
  }

  /**
   * Stop breaker timers
   */
  shutdown(): void {
    this.listBreaker.shutdown();
    this.downloadBreaker.shutdown();
  }

  private async list(path: string, operation: string): Promise<ListingOutcome> {
    try {
      const entries = await this.listBreaker.fire(path);
      return { entries, definitive: true };
    } catch (error) {
      if (error instanceof RemoteCatalogError && error.isNotFound()) {
        return { entries: [], definitive: true };
      }
      this.logger.logRemoteError(operation, error, { remotePath: path });
      return { entries: [], definitive: false };
    }
  }

  private folderNames(entries: HubTreeEntry[]): string[] {
    return entries
      .filter((entry) => entry.type === 'directory')
      .map((entry) => lastSegment(entry.path))
      .sort();
  }
}
