/**
 * Use Case Error Types
 *
 * Sealed error hierarchy for use case failures. Errors are categorized by type
 * so the HTTP layer can map them consistently and clients can branch on `code`.
 *
 * HTTP Status Mapping:
 * - ValidationError → 400 Bad Request
 * - UnauthorizedError → 401 Unauthorized
 * - ForbiddenError → 403 Forbidden
 * - UpstreamError → 502 Bad Gateway
 * - TimeoutError → 504 Gateway Timeout
 * - InternalError → 500 Internal Server Error
 */

/**
 * Base interface for all use case errors.
 */
export interface UseCaseErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

/**
 * Input validation failed (missing required fields, invalid format, etc.)
 */
export interface ValidationError extends UseCaseErrorBase {
	readonly type: 'validation';
}

/**
 * The caller could not be identified: credential missing, malformed or unknown.
 */
export interface UnauthorizedError extends UseCaseErrorBase {
	readonly type: 'unauthorized';
}

/**
 * The caller was identified but lacks the capability for the operation.
 */
export interface ForbiddenError extends UseCaseErrorBase {
	readonly type: 'forbidden';
}

/**
 * A downstream system was unreachable or refused the request.
 */
export interface UpstreamError extends UseCaseErrorBase {
	readonly type: 'upstream';
}

/**
 * A downstream system did not answer within the configured deadline.
 */
export interface TimeoutError extends UseCaseErrorBase {
	readonly type: 'timeout';
}

/**
 * The operation failed inside this service (persistence, exhausted retries).
 */
export interface InternalError extends UseCaseErrorBase {
	readonly type: 'internal';
}

/**
 * Union type for all use case errors.
 */
export type UseCaseError =
	| ValidationError
	| UnauthorizedError
	| ForbiddenError
	| UpstreamError
	| TimeoutError
	| InternalError;

/**
 * Discriminant values of {@link UseCaseError}.
 */
export type UseCaseErrorType = UseCaseError['type'];

/**
 * Factory functions for creating errors.
 */
export const UseCaseError = {
	/**
	 * Create a validation error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.validation('TOPIC_REQUIRED', 'topic is required', { field: 'topic' })
	 * ```
	 */
	validation(code: string, message: string, details: Record<string, unknown> = {}): ValidationError {
		return { type: 'validation', code, message, details };
	},

	unauthorized(code: string, message: string, details: Record<string, unknown> = {}): UnauthorizedError {
		return { type: 'unauthorized', code, message, details };
	},

	forbidden(code: string, message: string, details: Record<string, unknown> = {}): ForbiddenError {
		return { type: 'forbidden', code, message, details };
	},

	/**
	 * Create an upstream error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.upstream('UPSTREAM_REJECTED', 'Stream does not exist', { status: 400 })
	 * ```
	 */
	upstream(code: string, message: string, details: Record<string, unknown> = {}): UpstreamError {
		return { type: 'upstream', code, message, details };
	},

	timeout(code: string, message: string, details: Record<string, unknown> = {}): TimeoutError {
		return { type: 'timeout', code, message, details };
	},

	internal(code: string, message: string, details: Record<string, unknown> = {}): InternalError {
		return { type: 'internal', code, message, details };
	},

	/**
	 * Get the HTTP status code for an error.
	 */
	httpStatus(error: UseCaseError): number {
		switch (error.type) {
			case 'validation':
				return 400;
			case 'unauthorized':
				return 401;
			case 'forbidden':
				return 403;
			case 'upstream':
				return 502;
			case 'timeout':
				return 504;
			case 'internal':
				return 500;
		}
	},
};
