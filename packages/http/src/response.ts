/**
 * Response Utilities
 *
 * Utilities for mapping Result types to HTTP responses and
 * handling errors consistently with Fastify.
 */

import type { FastifyReply } from 'fastify';
import { Result, UseCaseError } from '@chat-gateway/domain-core';
import type { ErrorResponse } from './types.js';

/**
 * Get HTTP status code for a use case error.
 */
export function getErrorStatus(error: UseCaseError): number {
	return UseCaseError.httpStatus(error);
}

/**
 * Convert a use case error to an error response.
 */
export function toErrorResponse(error: UseCaseError): ErrorResponse {
	const hasDetails = Object.keys(error.details).length > 0;
	return {
		message: error.message,
		code: error.code,
		...(hasDetails ? { details: error.details } : {}),
	};
}

/**
 * Options for sending a result as HTTP response.
 */
export interface SendResultOptions<T, R> {
	/** Status code for success (default: 200) */
	successStatus?: number;
	/** Transform success value before sending */
	transform?: (value: T) => R;
}

/**
 * Send a Result as an HTTP response.
 *
 * On success, sends the value (optionally transformed) with the success status.
 * On failure, maps the error to an appropriate HTTP status and error response.
 *
 * @example
 * ```typescript
 * fastify.post('/api/create_client', async (request, reply) => {
 *     const result = await createClient.execute(command, ctx);
 *     return sendResult(reply, result, {
 *         successStatus: 201,
 *         transform: (created) => ({ token: created.token, stream: created.stream }),
 *     });
 * });
 * ```
 */
export function sendResult<T, R = T>(
	reply: FastifyReply,
	result: Result<T>,
	options: SendResultOptions<T, R> = {},
): FastifyReply {
	const { successStatus = 200, transform } = options;

	if (Result.isSuccess(result)) {
		const value = transform ? transform(result.value) : result.value;
		return reply.status(successStatus).send(value);
	}

	return sendError(reply, result.error);
}

/**
 * Send a use case error with its mapped status.
 */
export function sendError(reply: FastifyReply, error: UseCaseError): FastifyReply {
	return reply.status(getErrorStatus(error)).send(toErrorResponse(error));
}

function jsonError(
	reply: FastifyReply,
	status: number,
	code: string,
	message: string,
	details?: Record<string, unknown>,
): FastifyReply {
	const response: ErrorResponse = {
		code,
		message,
		...(details ? { details } : {}),
	};
	return reply.status(status).send(response);
}

/**
 * Create a bad request (400) error response.
 */
export function badRequest(reply: FastifyReply, message: string, details?: Record<string, unknown>): FastifyReply {
	return jsonError(reply, 400, 'BAD_REQUEST', message, details);
}
