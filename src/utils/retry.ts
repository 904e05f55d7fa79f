/**
 * Retry Utility - Resilient Startup Operations
 *
 * @description
 * Retries operations that may fail temporarily while the bot boots, such as
 * preparing the record schema or registering slash commands. The hosting
 * upload path never goes through here: a failed upload is reported to the
 * user instead of being repeated.
 *
 * @module utils/retry
 *
 * @example
 * ```typescript
 * await withRetry(
 *   async () => store.initialize(),
 *   { operationName: 'record schema initialisation', exponentialBackoff: true },
 * );
 * ```
 */

import { LogEngine } from '../config/logger';

/**
 * Retry operation configuration options
 */
export interface RetryOptions {
	maxAttempts?: number;
	baseDelayMs?: number;
	operationName?: string;
	exponentialBackoff?: boolean;
}

/**
 * Executes an operation, retrying with linear or exponential backoff
 *
 * @returns Result of the first successful attempt
 * @throws {Error} Wrapping the last failure once every attempt failed
 */
export async function withRetry<T>(
	operation: () => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const {
		maxAttempts = 3,
		baseDelayMs = 2000,
		operationName = 'operation',
		exponentialBackoff = false,
	} = options;

	let lastError: Error | null = null;

	for (let attempt = 0; attempt < maxAttempts; attempt++) {
		try {
			LogEngine.debug(`Attempt ${attempt + 1}/${maxAttempts} for ${operationName}...`);
			const result = await operation();

			if (attempt > 0) {
				LogEngine.info(`${operationName} succeeded on attempt ${attempt + 1}`);
			}

			return result;
		}
		catch (error) {
			lastError = error instanceof Error ? error : new Error(String(error));
			LogEngine.warn(`Attempt ${attempt + 1} of ${operationName} failed: ${lastError.message}`);

			if (attempt < maxAttempts - 1) {
				const delayMs = exponentialBackoff
					? baseDelayMs * Math.pow(2, attempt)
					: baseDelayMs * (attempt + 1);
				LogEngine.info(`Retrying ${operationName} in ${delayMs / 1000}s...`);
				await new Promise(resolve => setTimeout(resolve, delayMs));
			}
		}
	}

	LogEngine.error(`${operationName} failed after ${maxAttempts} attempts. Last error: ${lastError?.message}`);
	throw new Error(`${operationName} failed after ${maxAttempts} attempts: ${lastError?.message || 'Unknown error'}`, { cause: lastError ?? undefined });
}

export default { withRetry };
