import { describe, expect, it } from 'vitest';
import { Result } from '@chat-gateway/domain-core';
import { createAuthorizer, requireRole, type AuthContext } from '../application/authorizer.js';
import { ClientRecord, keyIdOf } from '../domain/index.js';

const records = new Map<string, ClientRecord>([
	['admin-token', ClientRecord.admin('admin-token')],
	['client-token', ClientRecord.regular('client-token', 2222, 'proposal 2222 stream')],
]);

const authorizer = createAuthorizer({ resolve: (token) => records.get(token) });

function errorCode(presented: string | string[] | undefined): string | undefined {
	const result = authorizer.authorize(presented);
	return Result.isFailure(result) ? result.error.code : undefined;
}

describe('createAuthorizer', () => {
	it('should resolve an admin token', () => {
		expect(Result.unwrap(authorizer.authorize('admin-token'))).toEqual({
			role: 'admin',
			keyId: keyIdOf('admin-token'),
		});
	});

	it('should resolve a regular token with its stream', () => {
		expect(Result.unwrap(authorizer.authorize('client-token'))).toEqual({
			role: 'regular',
			keyId: keyIdOf('client-token'),
			proposalNo: 2222,
			stream: 'proposal 2222 stream',
		});
	});

	it.each([
		['absent', undefined, 'MISSING_API_KEY'],
		['empty', '', 'MISSING_API_KEY'],
		['an empty list', [], 'MISSING_API_KEY'],
		['repeated', ['client-token', 'client-token'], 'MALFORMED_API_KEY'],
		['outside the token alphabet', 'client token', 'MALFORMED_API_KEY'],
		['too long', 'a'.repeat(257), 'MALFORMED_API_KEY'],
		['unknown', 'someone-else', 'UNKNOWN_API_KEY'],
	])('should reject a credential that is %s', (_label, presented, code) => {
		expect(errorCode(presented)).toBe(code);
	});

	it('should classify every identification failure as unauthorized', () => {
		const result = authorizer.authorize('someone-else');

		expect(Result.isFailure(result) && result.error.type).toBe('unauthorized');
	});

	it('should read records added after it was created', () => {
		records.set('late-token', ClientRecord.regular('late-token', 3, 'late'));

		expect(Result.isSuccess(authorizer.authorize('late-token'))).toBe(true);
		records.delete('late-token');
	});
});

describe('requireRole', () => {
	const admin: AuthContext = { role: 'admin', keyId: 'k1' };
	const regular: AuthContext = { role: 'regular', keyId: 'k2', proposalNo: 1, stream: 's' };

	it('should pass a caller with the role', () => {
		expect(Result.unwrap(requireRole(regular, 'regular'))).toBe(regular);
	});

	it('should refuse a regular client on admin operations', () => {
		const result = requireRole(regular, 'admin');

		expect(Result.isFailure(result) && result.error).toEqual({
			type: 'forbidden',
			code: 'ADMIN_REQUIRED',
			message: 'This operation requires an admin client',
			details: { requiredRole: 'admin' },
		});
	});

	it('should refuse an admin on relay operations', () => {
		const result = requireRole(admin, 'regular');

		expect(Result.isFailure(result) && result.error.code).toBe('REGULAR_CLIENT_REQUIRED');
	});
});
