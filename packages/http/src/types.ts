/**
 * HTTP Layer Types
 *
 * Type definitions for the HTTP layer including Fastify request decorators
 * and common interfaces.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from 'pino';

/**
 * Tracing data stored in request context.
 */
export interface TracingData {
	/** Correlation ID for distributed tracing (from header or generated) */
	readonly correlationId: string;
	/** Unique execution ID for this request */
	readonly executionId: string;
	/** Request start time */
	readonly startTime: number;
}

/**
 * Configuration for the tracing plugin.
 */
export interface TracingPluginOptions {
	/** Header name for correlation ID (default: X-Correlation-ID) */
	readonly correlationIdHeader?: string;
	/** Alternative header name for correlation ID (default: X-Request-ID) */
	readonly requestIdHeader?: string;
	/** Whether to add correlation ID to response headers (default: true) */
	readonly propagateToResponse?: boolean;
}

/**
 * Standard error response format.
 */
export interface ErrorResponse {
	/** Human-readable error message */
	readonly message: string;
	/** Machine-readable error code */
	readonly code: string;
	/** Additional error details */
	readonly details?: Record<string, unknown>;
}

declare module 'fastify' {
	interface FastifyRequest {
		/** Tracing context, set by the tracing plugin on every request */
		tracing: TracingData | null;
	}
}

export type { FastifyRequest, FastifyReply, Logger };
