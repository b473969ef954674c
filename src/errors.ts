/**
 * Base error class for Pulseboard application errors.
 */
export class PulseboardError extends Error {
	constructor(
		message: string,
		public override readonly cause?: Error,
	) {
		super(message);
		this.name = this.constructor.name;
	}
}

/**
 * Retryable errors - callers may try again, honoring retryAfterMs when set.
 */
export class RetryableError extends PulseboardError {
	constructor(
		message: string,
		public readonly retryAfterMs?: number,
		cause?: Error,
	) {
		super(message, cause);
	}
}

/**
 * Non-retryable errors - fail immediately, don't retry.
 */
export class NonRetryableError extends PulseboardError {}

// Specific error types

export type ExternalService = "backlog" | "slack";

export interface ExternalAPIErrorOptions {
	service: ExternalService;
	status?: number;
	/** Whether the failure is worth another attempt (network, 429, 5xx). */
	transient: boolean;
	retryAfterMs?: number;
	cause?: Error;
}

/**
 * A remote service call failed after the client's retry policy gave up,
 * or with a response that retrying cannot fix.
 */
export class ExternalAPIError extends RetryableError {
	readonly service: ExternalService;
	readonly status?: number;
	readonly transient: boolean;

	constructor(message: string, options: ExternalAPIErrorOptions) {
		super(message, options.retryAfterMs, options.cause);
		this.service = options.service;
		this.status = options.status;
		this.transient = options.transient;
	}
}

export class PersistenceError extends PulseboardError {}

/**
 * User input that cannot be accepted. helpText is safe to show to the user.
 */
export class ValidationError extends NonRetryableError {
	constructor(
		message: string,
		public readonly helpText: string,
	) {
		super(message);
	}
}

export class ConfigurationError extends NonRetryableError {
	constructor(public readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
	}
}

export class ReportServiceError extends PulseboardError {}

export class AIProviderError extends RetryableError {}

export class AIProviderTimeoutError extends AIProviderError {
	constructor(timeoutMs: number, cause?: Error) {
		super(`AI request timed out after ${timeoutMs}ms`, undefined, cause);
	}
}

/**
 * Normalize a thrown value into an Error for use as a cause.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
