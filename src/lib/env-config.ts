/**
 * Configuration Management
 *
 * Loads QCTX_* settings from the environment (and an optional .env file)
 * and validates them into a typed RuntimeConfig.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { Result, ok, err } from './result-types.js';
import type { LogLevel } from './logger.js';
import {
	ANN_CONFIG,
	CORPUS_CONFIG,
	EMBEDDING_CONFIG,
	RETRIEVAL_CONFIG,
	STORAGE_CONFIG,
} from '../constants/retrieval-constants.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

export interface HashingAdapterConfig {
	type: 'hashing';
	dimensions: number;
}

export interface TransformersAdapterConfig {
	type: 'transformers';
	/** Hugging Face model id with ONNX weights (e.g., Xenova/bge-small-en-v1.5) */
	model: string;
	/** Load the quantized ONNX weights */
	quantized: boolean;
	/** Where downloaded model files are kept */
	modelCacheDir?: string;
}

export interface HostedAdapterConfig {
	type: 'hosted';
	/** Base URL of an OpenAI-compatible API; /embeddings is appended */
	endpoint: string;
	/** API key (loaded from environment) */
	apiKey: string;
	model: string;
	timeoutMs: number;
}

export type EmbeddingAdapterConfig =
	| HashingAdapterConfig
	| TransformersAdapterConfig
	| HostedAdapterConfig;

export interface BatchingConfig {
	batchSize: number;
	concurrency: number;
	timeoutMs: number;
}

export interface RuntimeConfig {
	cacheDir: string;
	logDir: string;
	logLevel: LogLevel;
	embedding: EmbeddingAdapterConfig;
	batching: BatchingConfig;
	retrieval: {
		minScore: number;
	};
	ann: {
		minCardinality: number;
		nprobe: number;
	};
	corpus: {
		fieldMetadataMaxAgeDays: number;
	};
}

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
// Environment Schema
// ============================================================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
	QCTX_CACHE_DIR: z.string().default(STORAGE_CONFIG.DEFAULT_CACHE_DIR),
	QCTX_LOG_DIR: z.string().default(STORAGE_CONFIG.DEFAULT_LOG_DIR),
	QCTX_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('warn'),
	QCTX_EMBED_TYPE: z.enum(['hashing', 'transformers', 'hosted']).default('transformers'),
	QCTX_EMBED_MODEL: z.string().optional(),
	QCTX_EMBED_QUANTIZED: z.enum(['true', 'false', '1', '0']).default('true'),
	QCTX_EMBED_MODEL_CACHE_DIR: z.string().optional(),
	QCTX_EMBED_DIMENSIONS: positiveInt(EMBEDDING_CONFIG.DEFAULT_HASHING_DIMENSIONS),
	QCTX_EMBED_ENDPOINT: z.string().url().optional(),
	QCTX_EMBED_API_KEY: z.string().optional(),
	QCTX_EMBED_TIMEOUT_MS: positiveInt(EMBEDDING_CONFIG.DEFAULT_TIMEOUT_MS),
	QCTX_EMBED_BATCH_SIZE: positiveInt(EMBEDDING_CONFIG.DEFAULT_BATCH_SIZE),
	QCTX_EMBED_CONCURRENCY: positiveInt(EMBEDDING_CONFIG.DEFAULT_CONCURRENCY),
	QCTX_MIN_SCORE: z.coerce.number().min(-1).max(1).default(RETRIEVAL_CONFIG.DEFAULT_MIN_SCORE),
	QCTX_ANN_MIN_CARDINALITY: positiveInt(ANN_CONFIG.DEFAULT_MIN_CARDINALITY),
	QCTX_ANN_NPROBE: positiveInt(ANN_CONFIG.DEFAULT_NPROBE),
	QCTX_FIELD_METADATA_MAX_AGE_DAYS: z.coerce
		.number()
		.positive()
		.default(CORPUS_CONFIG.DEFAULT_FIELD_METADATA_MAX_AGE_DAYS),
});

type EnvSettings = z.infer<typeof envSchema>;

const ENV_KEYS = Object.keys(envSchema.shape);

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Manages configuration loading from environment variables and .env files
 */
export class ConfigurationManager {
	constructor(
		private env: NodeJS.ProcessEnv = process.env,
		private envPath?: string
	) {}

	/**
	 * Load variables from a .env file into the managed environment.
	 * A missing file is not an error.
	 */
	loadEnv(): Result<void, ConfigError> {
		try {
			loadEnv({ path: this.envPath, processEnv: this.env });
			return ok(undefined);
		} catch (error) {
			return err(
				new ConfigError(
					`Failed to load .env file: ${error instanceof Error ? error.message : 'Unknown error'}`
				)
			);
		}
	}

	/**
	 * Validate the environment into a RuntimeConfig
	 */
	getRuntimeConfig(): Result<RuntimeConfig, ConfigError> {
		const raw: Record<string, string> = {};
		for (const key of ENV_KEYS) {
			const value = this.env[key];
			// Blank values behave as unset
			if (value !== undefined && value.trim() !== '') {
				raw[key] = value.trim();
			}
		}

		const parsed = envSchema.safeParse(raw);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const key = issue?.path[0] ?? 'environment';
			return err(new ConfigError(`Invalid ${String(key)}: ${issue?.message ?? 'validation failed'}`));
		}

		return this.getEmbeddingConfig(parsed.data).map((embedding) => ({
			cacheDir: parsed.data.QCTX_CACHE_DIR,
			logDir: parsed.data.QCTX_LOG_DIR,
			logLevel: parsed.data.QCTX_LOG_LEVEL,
			embedding,
			batching: {
				batchSize: parsed.data.QCTX_EMBED_BATCH_SIZE,
				concurrency: parsed.data.QCTX_EMBED_CONCURRENCY,
				timeoutMs: parsed.data.QCTX_EMBED_TIMEOUT_MS,
			},
			retrieval: {
				minScore: parsed.data.QCTX_MIN_SCORE,
			},
			ann: {
				minCardinality: parsed.data.QCTX_ANN_MIN_CARDINALITY,
				nprobe: parsed.data.QCTX_ANN_NPROBE,
			},
			corpus: {
				fieldMetadataMaxAgeDays: parsed.data.QCTX_FIELD_METADATA_MAX_AGE_DAYS,
			},
		}));
	}

	private getEmbeddingConfig(settings: EnvSettings): Result<EmbeddingAdapterConfig, ConfigError> {
		switch (settings.QCTX_EMBED_TYPE) {
			case 'hashing':
				return ok({ type: 'hashing', dimensions: settings.QCTX_EMBED_DIMENSIONS });
			case 'transformers':
				return ok({
					type: 'transformers',
					model: settings.QCTX_EMBED_MODEL ?? EMBEDDING_CONFIG.DEFAULT_TRANSFORMERS_MODEL,
					quantized: settings.QCTX_EMBED_QUANTIZED === 'true' || settings.QCTX_EMBED_QUANTIZED === '1',
					modelCacheDir: settings.QCTX_EMBED_MODEL_CACHE_DIR,
				});
			case 'hosted': {
				if (!settings.QCTX_EMBED_API_KEY) {
					return err(
						new ConfigError(
							'Missing required config: QCTX_EMBED_API_KEY. ' +
								'Set this environment variable or add it to your .env file.'
						)
					);
				}
				if (!settings.QCTX_EMBED_ENDPOINT) {
					return err(new ConfigError('Missing required config: QCTX_EMBED_ENDPOINT'));
				}
				if (!settings.QCTX_EMBED_MODEL) {
					return err(new ConfigError('Missing required config: QCTX_EMBED_MODEL'));
				}
				return ok({
					type: 'hosted',
					endpoint: settings.QCTX_EMBED_ENDPOINT,
					apiKey: settings.QCTX_EMBED_API_KEY,
					model: settings.QCTX_EMBED_MODEL,
					timeoutMs: settings.QCTX_EMBED_TIMEOUT_MS,
				});
			}
		}
	}
}

/**
 * Mask API key for safe logging (show only last 4 characters)
 */
export function maskApiKey(apiKey: string): string {
	if (apiKey.length <= 4) {
		return '****';
	}
	return '****' + apiKey.slice(-4);
}

/**
 * Embedding settings fit for a log line; the API key is masked
 */
export function describeEmbeddingConfig(config: EmbeddingAdapterConfig): Record<string, unknown> {
	return config.type === 'hosted' ? { ...config, apiKey: maskApiKey(config.apiKey) } : { ...config };
}

/**
 * Load .env and validate in one step
 *
 * @param envPath - Optional path to .env file
 */
export function loadRuntimeConfig(
	env: NodeJS.ProcessEnv = process.env,
	envPath?: string
): Result<RuntimeConfig, ConfigError> {
	const manager = new ConfigurationManager(env, envPath);
	return manager.loadEnv().andThen(() => manager.getRuntimeConfig());
}
