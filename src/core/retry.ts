/**
 * Bounded retry with exponential backoff for remote calls.
 */

import { RetryableError } from "../errors";

export interface RetryPolicy {
	/** Total attempts, including the first one */
	attempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	attempts: 3,
	baseDelayMs: 1000,
	maxDelayMs: 60000,
};

export interface RetryOptions extends RetryPolicy {
	shouldRetry: (error: unknown) => boolean;
	onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
	sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the attempt after `attempt` (1-based): base * 2^(attempt-1), capped.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
	return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Parse a Retry-After header given in seconds.
 */
export function parseRetryAfter(header: string | null): number | undefined {
	if (!header) return undefined;
	const seconds = Number.parseInt(header, 10);
	return Number.isNaN(seconds) || seconds < 0 ? undefined : seconds * 1000;
}

/**
 * Run fn until it succeeds, shouldRetry rejects the error, or attempts run out.
 * A RetryableError's retryAfterMs replaces the computed backoff.
 */
export async function withRetry<T>(
	fn: (attempt: number) => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const wait = options.sleep ?? sleep;

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn(attempt);
		} catch (error) {
			if (attempt >= options.attempts || !options.shouldRetry(error)) {
				throw error;
			}
			const delayMs =
				error instanceof RetryableError && error.retryAfterMs !== undefined
					? error.retryAfterMs
					: backoffDelay(attempt, options);
			options.onRetry?.({ attempt, delayMs, error });
			await wait(delayMs);
		}
	}
}
