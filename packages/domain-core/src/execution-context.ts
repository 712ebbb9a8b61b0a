/**
 * Execution Context
 *
 * Context for a use case execution. Carries the tracing IDs and the identity
 * of the principal through a single operation so that logs written by the
 * use case and by the infrastructure it calls can be correlated.
 */

import { randomUUID } from 'node:crypto';

/**
 * Execution context data.
 */
export interface ExecutionContext {
	/** Unique ID for this execution (generated) */
	readonly executionId: string;
	/** ID for distributed tracing (usually from original request) */
	readonly correlationId: string;
	/** Non-secret identifier of the principal performing the action */
	readonly principalId: string;
	/** When the execution was initiated */
	readonly initiatedAt: Date;
}

function generateExecutionId(): string {
	return `exec-${randomUUID()}`;
}

/**
 * ExecutionContext factory functions.
 */
export const ExecutionContext = {
	/**
	 * Create a new execution context for a fresh operation.
	 * The correlation ID starts out equal to the execution ID.
	 */
	create(principalId: string): ExecutionContext {
		const executionId = generateExecutionId();
		return {
			executionId,
			correlationId: executionId,
			principalId,
			initiatedAt: new Date(),
		};
	},

	/**
	 * Create a new execution context with a specific correlation ID.
	 *
	 * Use this when you have an existing correlation ID from an
	 * upstream system or request header.
	 */
	withCorrelation(principalId: string, correlationId: string): ExecutionContext {
		return {
			executionId: generateExecutionId(),
			correlationId,
			principalId,
			initiatedAt: new Date(),
		};
	},
};
