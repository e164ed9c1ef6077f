/**
 * Configuration Management
 *
 * Centralized configuration with environment variable and .env support,
 * validated with zod.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { Result, ok, err, trySync } from './result-types.js';
import {
	EMBEDDING_DEFAULTS,
	PROJECTION_DEFAULTS,
	SIZE_ESTIMATE_CONFIG,
} from '../constants/calibration-constants.js';

// ============================================================================
// Configuration Schema
// ============================================================================

const HubConfigSchema = z.object({
	/** Hub base URL */
	endpoint: z.string().url(),

	/** Dataset repository holding data/<subject>/<year>/<month>/*.parquet */
	repoId: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected <owner>/<name>'),

	/** Branch or commit */
	revision: z.string().min(1),

	/** Access token (optional for public datasets) */
	token: z.string().min(1).optional(),

	/** Per-request timeout in milliseconds */
	timeoutMs: z.number().int().positive(),
});

const EmbeddingConfigSchema = z.object({
	/** Model identifier; embedding caches are partitioned by it */
	modelId: z.string().min(1),

	/** OpenAI-compatible embeddings endpoint */
	endpoint: z.string().url().optional(),

	/** API key for the endpoint */
	apiKey: z.string().min(1).optional(),

	/** Papers per embedding request */
	batchSize: z.number().int().min(1).max(2048),

	/** Characters of title + abstract sent to the model */
	textBudget: z.number().int().positive(),
});

const ProjectionConfigSchema = z.object({
	nNeighbors: z.number().int().min(2),
	minDist: z.number().min(0).max(1),
	seed: z.number().int(),
});

export const AppConfigSchema = z.object({
	/** Root of the persisted cache tree */
	cacheRoot: z.string().min(1),

	/** Directory for JSON Lines logs */
	logDir: z.string().min(1),

	/** Always re-fetch the current calendar month, even when cached */
	refetchCurrentMonth: z.boolean(),

	/** Bytes-per-paper ratio used for size-based estimates */
	bytesPerPaper: z.number().positive(),

	hub: HubConfigSchema,
	embedding: EmbeddingConfigSchema,
	projection: ProjectionConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type HubConfig = z.infer<typeof HubConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type ProjectionConfig = z.infer<typeof ProjectionConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = {
	cacheRoot: 'output',
	logDir: 'output/logs',
	refetchCurrentMonth: true,
	bytesPerPaper: SIZE_ESTIMATE_CONFIG.BYTES_PER_PAPER,
	hub: {
		endpoint: 'https://huggingface.co',
		repoId: 'permutans/arxiv-papers-by-subject',
		revision: 'main',
		timeoutMs: 30000,
	},
	embedding: {
		modelId: EMBEDDING_DEFAULTS.MODEL_ID,
		batchSize: EMBEDDING_DEFAULTS.BATCH_SIZE,
		textBudget: EMBEDDING_DEFAULTS.TEXT_BUDGET,
	},
	projection: {
		nNeighbors: PROJECTION_DEFAULTS.N_NEIGHBORS,
		minDist: PROJECTION_DEFAULTS.MIN_DIST,
		seed: PROJECTION_DEFAULTS.SEED,
	},
};

// ============================================================================
// Configuration Error
// ============================================================================

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Builds the application configuration from environment variables
 * layered over DEFAULT_CONFIG.
 */
export class ConfigurationManager {
	constructor(
		private envPath?: string,
		private env: NodeJS.ProcessEnv = process.env
	) {}

	/**
	 * Load environment variables from .env file (a missing file is fine)
	 */
	loadEnv(): Result<void, ConfigError> {
		return trySync(
			() => {
				loadEnv({ path: this.envPath });
			},
			(error) =>
				new ConfigError(`Failed to load .env file: ${error instanceof Error ? error.message : 'Unknown error'}`)
		);
	}

	/**
	 * Resolve and validate the full configuration
	 */
	load(): Result<AppConfig, ConfigError> {
		const numbers: Array<[string, number | undefined]> = [];
		const num = (key: string): number | undefined => {
			const value = this.getEnvNumber(key);
			numbers.push([key, value]);
			return value;
		};

		const candidate = {
			cacheRoot: this.getEnvVar('ARXIV_CACHE_ROOT') ?? DEFAULT_CONFIG.cacheRoot,
			logDir: this.getEnvVar('ARXIV_LOG_DIR') ?? DEFAULT_CONFIG.logDir,
			refetchCurrentMonth: this.getEnvBoolean('REFETCH_CURRENT_MONTH') ?? DEFAULT_CONFIG.refetchCurrentMonth,
			bytesPerPaper: num('ESTIMATE_BYTES_PER_PAPER') ?? DEFAULT_CONFIG.bytesPerPaper,
			hub: {
				endpoint: this.getEnvVar('HUB_ENDPOINT') ?? DEFAULT_CONFIG.hub.endpoint,
				repoId: this.getEnvVar('HUB_DATASET_REPO') ?? DEFAULT_CONFIG.hub.repoId,
				revision: this.getEnvVar('HUB_REVISION') ?? DEFAULT_CONFIG.hub.revision,
				token: this.getEnvVar('HUB_TOKEN'),
				timeoutMs: num('HUB_TIMEOUT_MS') ?? DEFAULT_CONFIG.hub.timeoutMs,
			},
			embedding: {
				modelId: this.getEnvVar('EMBED_MODEL_ID') ?? DEFAULT_CONFIG.embedding.modelId,
				endpoint: this.getEnvVar('EMBED_ENDPOINT'),
				apiKey: this.getEnvVar('EMBED_API_KEY'),
				batchSize: num('EMBED_BATCH_SIZE') ?? DEFAULT_CONFIG.embedding.batchSize,
				textBudget: num('EMBED_TEXT_BUDGET') ?? DEFAULT_CONFIG.embedding.textBudget,
			},
			projection: {
				nNeighbors: num('PROJECTION_NEIGHBORS') ?? DEFAULT_CONFIG.projection.nNeighbors,
				minDist: num('PROJECTION_MIN_DIST') ?? DEFAULT_CONFIG.projection.minDist,
				seed: num('PROJECTION_SEED') ?? DEFAULT_CONFIG.projection.seed,
			},
		};

		const unparsable = numbers.filter(([key, value]) => value === undefined && this.getEnvVar(key) !== undefined);
		if (unparsable.length > 0) {
			return err(new ConfigError(`Not a number: ${unparsable.map(([key]) => key).join(', ')}`));
		}

		const parsed = AppConfigSchema.safeParse(candidate);
		if (!parsed.success) {
			const details = parsed.error.issues
				.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
				.join('; ');
			return err(new ConfigError(`Invalid configuration: ${details}`));
		}

		return ok(parsed.data);
	}

	/**
	 * Get environment variable (empty strings count as unset)
	 */
	private getEnvVar(key: string): string | undefined {
		const value = this.env[key];
		return value === undefined || value === '' ? undefined : value;
	}

	private getEnvNumber(key: string): number | undefined {
		const value = this.getEnvVar(key);
		if (value === undefined) return undefined;
		const num = Number(value);
		return Number.isFinite(num) ? num : undefined;
	}

	private getEnvBoolean(key: string): boolean | undefined {
		const value = this.getEnvVar(key);
		if (value === undefined) return undefined;
		return value.toLowerCase() === 'true' || value === '1';
	}

	/**
	 * Mask a secret for safe logging (show only last 4 characters)
	 */
	maskSecret(secret: string): string {
		if (secret.length <= 4) {
			return '****';
		}
		return '****' + secret.slice(-4);
	}
}

/**
 * Global configuration manager instance
 */
let globalConfigManager: ConfigurationManager | null = null;

/**
 * Get or create the global configuration manager
 */
export function getConfigManager(): ConfigurationManager {
	if (!globalConfigManager) {
		globalConfigManager = new ConfigurationManager();
		// Try to load .env file (non-fatal if missing)
		globalConfigManager.loadEnv();
	}
	return globalConfigManager;
}
