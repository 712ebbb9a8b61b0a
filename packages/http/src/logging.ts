/**
 * Structured Logging
 *
 * Fastify uses Pino natively; this module derives request-scoped loggers
 * carrying the tracing IDs so every record of a request can be correlated.
 */

import type { FastifyBaseLogger } from 'fastify';
import type { TracingData } from './types.js';

/**
 * Create a child logger with tracing context.
 *
 * @param baseLogger - The request or application logger
 * @param tracing - Tracing data from request context
 */
export function createRequestLogger(baseLogger: FastifyBaseLogger, tracing: TracingData): FastifyBaseLogger {
	return baseLogger.child({
		correlationId: tracing.correlationId,
		executionId: tracing.executionId,
	});
}
