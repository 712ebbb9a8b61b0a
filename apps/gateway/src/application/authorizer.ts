/**
 * Authorizer
 *
 * Resolves a presented credential to the caller's capabilities. Failing to
 * identify the caller is `unauthorized` (401); an identified caller lacking
 * the capability is `forbidden` (403). Has no side effects.
 */

import { Result, UseCaseError } from '@chat-gateway/domain-core';
import { isWellFormedToken, keyIdOf, type ClientRole } from '../domain/index.js';
import type { ClientLookup } from '../infrastructure/client-registry.js';

export interface AdminContext {
	readonly role: 'admin';
	readonly keyId: string;
}

export interface RegularContext {
	readonly role: 'regular';
	readonly keyId: string;
	readonly proposalNo: number;
	readonly stream: string;
}

export type AuthContext = AdminContext | RegularContext;

export type ContextFor<R extends ClientRole> = Extract<AuthContext, { role: R }>;

export interface Authorizer {
	/**
	 * Resolve the raw header value(s) presented by the caller.
	 */
	authorize(presented: string | string[] | undefined): Result<AuthContext>;
	/**
	 * Require exactly the given role.
	 */
	requireRole<R extends ClientRole>(context: AuthContext, role: R): Result<ContextFor<R>>;
}

function hasRole<R extends ClientRole>(context: AuthContext, role: R): context is ContextFor<R> {
	return context.role === role;
}

const ROLE_REQUIRED: Record<ClientRole, { code: string; message: string }> = {
	admin: { code: 'ADMIN_REQUIRED', message: 'This operation requires an admin client' },
	regular: { code: 'REGULAR_CLIENT_REQUIRED', message: 'This operation requires a regular client' },
};

/**
 * Check the role of an authorized caller.
 */
export function requireRole<R extends ClientRole>(context: AuthContext, role: R): Result<ContextFor<R>> {
	if (hasRole(context, role)) {
		return Result.success(context);
	}
	const { code, message } = ROLE_REQUIRED[role];
	return Result.failure(UseCaseError.forbidden(code, message, { requiredRole: role }));
}

export function createAuthorizer(clients: ClientLookup): Authorizer {
	return {
		authorize(presented) {
			if (presented === undefined || (Array.isArray(presented) && presented.length === 0)) {
				return Result.failure(UseCaseError.unauthorized('MISSING_API_KEY', 'API key required'));
			}
			if (Array.isArray(presented)) {
				return Result.failure(UseCaseError.unauthorized('MALFORMED_API_KEY', 'API key header must appear once'));
			}
			if (presented.length === 0) {
				return Result.failure(UseCaseError.unauthorized('MISSING_API_KEY', 'API key required'));
			}
			if (!isWellFormedToken(presented)) {
				return Result.failure(UseCaseError.unauthorized('MALFORMED_API_KEY', 'API key is malformed'));
			}

			const record = clients.resolve(presented);
			if (!record) {
				return Result.failure(UseCaseError.unauthorized('UNKNOWN_API_KEY', 'Unknown API key'));
			}

			const keyId = keyIdOf(record.token);
			const context: AuthContext =
				record.role === 'admin'
					? { role: 'admin', keyId }
					: { role: 'regular', keyId, proposalNo: record.proposalNo, stream: record.stream };
			return Result.success(context);
		},

		requireRole,
	};
}
