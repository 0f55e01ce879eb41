/**
 * Retry and Timeout Utilities
 *
 * Exponential backoff for transient adapter failures, and deadlines for
 * provider calls so that a stuck provider surfaces as an error.
 */

import { Result, err } from './result-types.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { AdapterError, AdapterRateLimitError, AdapterTimeoutError } from '../services/embedding/adapter-interface.js';

/**
 * Retry configuration
 */
export interface RetryConfig {
	/** Maximum number of retry attempts */
	maxRetries: number;

	/** Initial delay in milliseconds */
	initialDelayMs: number;

	/** Maximum delay in milliseconds */
	maxDelayMs: number;

	/** Backoff multiplier (typically 2 for exponential) */
	backoffMultiplier: number;

	/** Error codes that should trigger retry */
	retryableErrors: string[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxRetries: 3,
	initialDelayMs: 1000,
	maxDelayMs: 30000,
	backoffMultiplier: 2,
	retryableErrors: [
		'ADAPTER_NETWORK_ERROR',
		'ADAPTER_TIMEOUT',
		'ADAPTER_RATE_LIMIT',
	],
};

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute function with exponential backoff retry
 *
 * Non-retryable errors are returned immediately without retry.
 */
export async function withRetry<T>(
	fn: () => Promise<Result<T, AdapterError>>,
	config: RetryConfig = DEFAULT_RETRY_CONFIG,
	log: Logger = defaultLogger
): Promise<Result<T, AdapterError>> {
	let attempt = 0;

	for (;;) {
		const result = await fn();

		if (result.isOk()) {
			return result;
		}

		const error = result.error;

		if (
			!error.retryable ||
			!config.retryableErrors.includes(error.code) ||
			attempt >= config.maxRetries
		) {
			return err(error);
		}

		const delay = Math.min(
			config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt),
			config.maxDelayMs
		);

		const actualDelay =
			error instanceof AdapterRateLimitError && typeof error.retryAfterMs === 'number'
				? Math.min(error.retryAfterMs, config.maxDelayMs)
				: delay;

		attempt++;
		log.debug('Retrying embedding call', {
			attempt,
			maxRetries: config.maxRetries,
			delayMs: actualDelay,
			code: error.code,
		});

		await sleep(actualDelay);
	}
}

/**
 * Create a retry configuration with custom settings
 */
export function createRetryConfig(
	overrides: Partial<RetryConfig>
): RetryConfig {
	return {
		...DEFAULT_RETRY_CONFIG,
		...overrides,
	};
}

/**
 * Race an operation against a deadline
 *
 * The signal handed to `fn` is aborted when the deadline passes, so
 * adapters that support cancellation can stop work early.
 */
export async function withTimeout<T>(
	fn: (signal: AbortSignal) => Promise<Result<T, AdapterError>>,
	timeoutMs: number,
	operation: string
): Promise<Result<T, AdapterError>> {
	const controller = new AbortController();
	let timer: NodeJS.Timeout | undefined;

	const deadline = new Promise<Result<T, AdapterError>>((resolve) => {
		timer = setTimeout(() => {
			controller.abort();
			resolve(err(new AdapterTimeoutError(`${operation} timed out after ${timeoutMs}ms`)));
		}, timeoutMs);
	});

	try {
		return await Promise.race([fn(controller.signal), deadline]);
	} finally {
		clearTimeout(timer);
	}
}
