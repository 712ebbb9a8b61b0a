import { ExecutionContext } from '@chat-gateway/domain-core';
import { requireTracing } from '@chat-gateway/http';
import type { FastifyRequest } from 'fastify';
import type { AuthContext } from '../application/index.js';

/**
 * Execution context for a use case call made on behalf of an authorized caller.
 * The principal is the caller's key id, never the token.
 */
export function executionContextFor(request: FastifyRequest, caller: AuthContext): ExecutionContext {
	return ExecutionContext.withCorrelation(caller.keyId, requireTracing(request).correlationId);
}
