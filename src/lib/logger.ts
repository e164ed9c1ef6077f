/**
 * Structured Logging Module
 *
 * Provides structured logging for remote catalog failures, cache corruption
 * and general operator messages using JSON Lines (.jsonl) format.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Remote catalog or download failure
 */
export interface RemoteErrorLog extends BaseLogEntry {
	type: 'remote_error';
	operation: string;
	remote_path?: string;
	error_code: string;
	error_message: string;
	context?: Record<string, unknown>;
}

/**
 * A cache file that exists but could not be read
 */
export interface CacheCorruptionLog extends BaseLogEntry {
	type: 'cache_corruption';
	level: 'warn';
	path: string;
	reason: string;
	context?: Record<string, unknown>;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: Record<string, unknown>;
}

export type LogEntry = RemoteErrorLog | CacheCorruptionLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files (default: output/logs) */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

/**
 * Pulls a code and message out of whatever was thrown
 */
export function describeError(error: unknown): { code: string; message: string; stack?: string } {
	if (error instanceof Error) {
		const code = 'code' in error && typeof error.code === 'string' ? error.code : error.name;
		return { code, message: error.message, stack: error.stack };
	}
	return { code: 'UNKNOWN', message: String(error) };
}

/**
 * Structured JSON Lines logger
 */
export class Logger {
	private logDir: string;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;
	private dirReady = false;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir ?? process.env.ARXIV_LOG_DIR ?? path.join('output', 'logs');
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';
	}

	/**
	 * Change the console threshold (used by --verbose / --quiet)
	 */
	setConsoleLevel(level: LogLevel): void {
		this.consoleLevel = level;
	}

	getLogDir(): string {
		return this.logDir;
	}

	private ensureLogDirectory(): void {
		if (this.dirReady) {
			return;
		}
		if (!fs.existsSync(this.logDir)) {
			fs.mkdirSync(this.logDir, { recursive: true });
		}
		this.dirReady = true;
	}

	private getLogFilePath(logType: string): string {
		return path.join(this.logDir, `${logType}.jsonl`);
	}

	private writeLogEntry(logType: string, entry: LogEntry): void {
		const logLine = JSON.stringify(entry) + '\n';

		try {
			this.ensureLogDirectory();
			fs.appendFileSync(this.getLogFilePath(logType), logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LEVELS.indexOf(entry.level) < LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;
		const body = entry.type === 'general' ? entry.message : JSON.stringify(entry);

		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(prefix, body);
				break;
			case 'warn':
				console.warn(prefix, body);
				break;
			default:
				console.log(prefix, body);
		}
	}

	/**
	 * Log a failed remote listing or download
	 */
	logRemoteError(
		operation: string,
		error: unknown,
		context?: { remotePath?: string; level?: 'warn' | 'error'; additionalContext?: Record<string, unknown> }
	): void {
		const described = describeError(error);
		const entry: RemoteErrorLog = {
			timestamp: new Date().toISOString(),
			level: context?.level ?? 'warn',
			type: 'remote_error',
			operation,
			remote_path: context?.remotePath,
			error_code: described.code,
			error_message: described.message,
			context: context?.additionalContext,
		};

		this.writeLogEntry('remote-errors', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log an unreadable cache file
	 */
	logCacheCorruption(filePath: string, reason: unknown, context?: Record<string, unknown>): void {
		const entry: CacheCorruptionLog = {
			timestamp: new Date().toISOString(),
			level: 'warn',
			type: 'cache_corruption',
			path: filePath,
			reason: describeError(reason).message,
			context,
		};

		this.writeLogEntry('cache-corruption', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a general message
	 */
	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		const entry: GeneralLog = {
			timestamp: new Date().toISOString(),
			level,
			type: 'general',
			message,
			context,
		};

		this.writeLogEntry('general', entry);
		this.outputToConsole(entry);
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.log('fatal', message, context);
	}
}

/**
 * Default logger instance
 */
export const logger = new Logger();
