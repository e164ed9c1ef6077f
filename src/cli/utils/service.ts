import { getConfigManager } from '../../lib/env-config.js';
import { Result, err } from '../../lib/result-types.js';
import type { InvalidRequestError } from '../../lib/errors/CacheErrors.js';
import { parseYearMonth, validateSelection, type Selection, type YearMonth } from '../../models/Selection.js';
import { Logger, type LogLevel } from '../../lib/logger.js';
import { ArxivCacheService } from '../../services/ArxivCacheService.js';
import { output } from './output.js';

let consoleLevel: LogLevel = 'warn';

/**
 * Console threshold for loggers created by `withService`
 */
export function setConsoleLevel(level: LogLevel): void {
  consoleLevel = level;
}

/**
 * Runs a command body against a service; commands take one so tests can
 * hand in a service built over a temporary cache
 */
export type ServiceRunner = (fn: (service: ArxivCacheService) => Promise<void>) => Promise<void>;

/**
 * Builds the service from the environment, runs `fn`, and always shuts the
 * service down afterwards. Configuration errors set a failing exit code.
 */
export async function withService(fn: (service: ArxivCacheService) => Promise<void>): Promise<void> {
  const config = getConfigManager().load();
  if (config.isErr()) {
    output.error('Invalid configuration', config.error);
    process.exitCode = 1;
    return;
  }

  const logger = new Logger({ logDir: config.value.logDir, consoleLevel });
  const service = new ArxivCacheService(config.value, { logger });
  try {
    await fn(service);
  } finally {
    service.shutdown();
  }
}

/**
 * Splits repeated and comma-separated option values
 */
export function splitList(values: string[] | undefined): string[] {
  if (!values) return [];
  return values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/**
 * Selection from `--categories` and `--periods` values
 */
export function parseSelectionOptions(
  categories: string[] | undefined,
  periods: string[] | undefined
): Result<Selection, InvalidRequestError> {
  const yearMonths: YearMonth[] = [];
  for (const value of splitList(periods)) {
    const parsed = parseYearMonth(value);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    yearMonths.push(parsed.value);
  }
  return validateSelection({ categories: splitList(categories), yearMonths });
}
