/**
 * Tracing Plugin
 *
 * Fastify plugin for request tracing. Extracts the correlation ID from request
 * headers, generates one if absent, binds it to the request logger and
 * propagates it to the response headers.
 */

import { randomUUID } from 'node:crypto';
import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { createRequestLogger } from '../logging.js';
import type { TracingPluginOptions, TracingData } from '../types.js';

/** Default header names */
const DEFAULT_CORRELATION_ID_HEADER = 'x-correlation-id';
const DEFAULT_REQUEST_ID_HEADER = 'x-request-id';

/** Upper bound on a caller-supplied correlation ID */
const MAX_CORRELATION_ID_LENGTH = 128;

function headerValue(value: string | string[] | undefined): string | undefined {
	const first = Array.isArray(value) ? value[0] : value;
	if (first === undefined || first.length === 0 || first.length > MAX_CORRELATION_ID_LENGTH) {
		return undefined;
	}
	return first;
}

/**
 * Tracing plugin for Fastify.
 *
 * @example
 * ```typescript
 * const fastify = Fastify();
 * await fastify.register(tracingPlugin);
 *
 * fastify.get('/api/me', (request) => {
 *     const { correlationId } = requireTracing(request);
 *     return { correlationId };
 * });
 * ```
 */
const tracingPluginAsync: FastifyPluginAsync<TracingPluginOptions> = async (fastify, opts) => {
	const {
		correlationIdHeader = DEFAULT_CORRELATION_ID_HEADER,
		requestIdHeader = DEFAULT_REQUEST_ID_HEADER,
		propagateToResponse = true,
	} = opts;

	fastify.decorateRequest('tracing', null);

	fastify.addHook('onRequest', async (request, reply) => {
		const correlationId =
			headerValue(request.headers[correlationIdHeader]) ??
			headerValue(request.headers[requestIdHeader]) ??
			`trace-${randomUUID()}`;

		const tracingData: TracingData = {
			correlationId,
			executionId: `exec-${randomUUID()}`,
			startTime: Date.now(),
		};
		request.tracing = tracingData;
		request.log = createRequestLogger(request.log, tracingData);

		if (propagateToResponse) {
			reply.header(correlationIdHeader, correlationId);
		}
	});
};

export const tracingPlugin = fp(tracingPluginAsync, {
	name: 'gateway-tracing',
	fastify: '5.x',
});

/**
 * Get tracing data from request, throwing if not available.
 *
 * @throws Error if tracing plugin has not been applied
 */
export function requireTracing(request: { tracing: TracingData | null }): TracingData {
	const tracing = request.tracing;
	if (!tracing) {
		throw new Error('Tracing context not available. Ensure tracingPlugin is registered.');
	}
	return tracing;
}

