/**
 * Record file I/O
 *
 * Local cache files are JSON Lines. Files fetched from the hub are Parquet
 * and are recognised by their `PAR1` magic bytes.
 */

import { promises as fs } from 'fs';
import { dirname, basename, join } from 'path';
import { randomUUID } from 'crypto';
import type { z } from 'zod';
import { parquetRead } from 'hyparquet';
import { compressors } from 'hyparquet-compressors';
import { Result, ok, err } from './result-types.js';
import { CacheCorruptionError } from './errors/CacheErrors.js';

const PARQUET_MAGIC = 'PAR1';

/**
 * True when the buffer starts with the Parquet magic bytes
 */
export function isParquetBuffer(buffer: Uint8Array): boolean {
	return buffer.byteLength >= 4 && Buffer.from(buffer.subarray(0, 4)).toString('latin1') === PARQUET_MAGIC;
}

/**
 * Makes decoded Parquet values JSON-safe (bigint, Date)
 */
export function toJsonValue(value: unknown): unknown {
	if (typeof value === 'bigint') {
		const asNumber = Number(value);
		return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		return value.map((v) => toJsonValue(v));
	}
	if (value !== null && typeof value === 'object') {
		const out: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			out[k] = toJsonValue(v);
		}
		return out;
	}
	return value;
}

async function decodeParquet(buffer: Uint8Array): Promise<unknown[]> {
	const file = new ArrayBuffer(buffer.byteLength);
	new Uint8Array(file).set(buffer);

	let rows: unknown[] = [];
	await parquetRead({
		file,
		compressors,
		rowFormat: 'object',
		onComplete: (decoded: unknown[]) => {
			rows = decoded;
		},
	});
	return rows.map((row) => toJsonValue(row));
}

function decodeJsonLines(text: string): unknown[] {
	const rows: unknown[] = [];
	const lines = text.split('\n');
	for (let i = 0; i < lines.length; i++) {
		const line = lines[i].trim();
		if (line.length === 0) continue;
		try {
			rows.push(JSON.parse(line));
		} catch {
			throw new Error(`line ${i + 1} is not valid JSON`);
		}
	}
	return rows;
}

/**
 * Reads and validates every record of a JSON Lines or Parquet file.
 * Missing, truncated or invalid files come back as a CacheCorruptionError.
 */
export async function readRecordFile<T>(
	filePath: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<Result<T[], CacheCorruptionError>> {
	let raw: unknown[];
	try {
		const buffer = await fs.readFile(filePath);
		raw = isParquetBuffer(buffer) ? await decodeParquet(buffer) : decodeJsonLines(buffer.toString('utf8'));
	} catch (error) {
		const cause = error instanceof Error ? error : new Error(String(error));
		return err(new CacheCorruptionError(filePath, cause.message, cause));
	}

	const records: T[] = [];
	for (let i = 0; i < raw.length; i++) {
		const parsed = schema.safeParse(raw[i]);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			return err(
				new CacheCorruptionError(
					filePath,
					`record ${i + 1}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid record'}`
				)
			);
		}
		records.push(parsed.data);
	}
	return ok(records);
}

/**
 * Writes records as JSON Lines through a temporary file and a rename.
 * Readers see the old file or the new one, never a partial write.
 */
export async function writeRecordFileAtomic(filePath: string, records: readonly unknown[]): Promise<void> {
	const dir = dirname(filePath);
	await fs.mkdir(dir, { recursive: true });

	const tempPath = join(dir, `.${basename(filePath)}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`);
	const body = records.map((record) => JSON.stringify(record)).join('\n');

	try {
		await fs.writeFile(tempPath, records.length > 0 ? body + '\n' : '', 'utf8');
		await fs.rename(tempPath, filePath);
	} catch (error) {
		await fs.rm(tempPath, { force: true });
		throw error;
	}
}

/**
 * Writes one JSON document through a temporary file and a rename
 */
export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<void> {
	const dir = dirname(filePath);
	await fs.mkdir(dir, { recursive: true });

	const tempPath = join(dir, `.${basename(filePath)}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`);
	try {
		await fs.writeFile(tempPath, JSON.stringify(value), 'utf8');
		await fs.rename(tempPath, filePath);
	} catch (error) {
		await fs.rm(tempPath, { force: true });
		throw error;
	}
}
