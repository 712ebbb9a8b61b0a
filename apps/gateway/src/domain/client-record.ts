/**
 * Client Records
 *
 * A client is identified by an opaque bearer token. Admin clients may only
 * provision; regular clients may only post, and only to their bound stream.
 */

import { createHash } from 'node:crypto';

export type ClientRole = 'admin' | 'regular';

export interface AdminClient {
	readonly role: 'admin';
	readonly token: string;
}

export interface RegularClient {
	readonly role: 'regular';
	readonly token: string;
	readonly proposalNo: number;
	readonly stream: string;
}

export type ClientRecord = AdminClient | RegularClient;

/** Characters a token may contain (base64url alphabet). */
export const TOKEN_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Longest credential the gateway will look up. */
export const MAX_TOKEN_LENGTH = 256;

export function isWellFormedToken(value: string): boolean {
	return value.length > 0 && value.length <= MAX_TOKEN_LENGTH && TOKEN_PATTERN.test(value);
}

/**
 * Non-secret fingerprint of a token for logs and audit output.
 * First 12 hex characters of its SHA-256 digest.
 */
export function keyIdOf(token: string): string {
	return createHash('sha256').update(token).digest('hex').slice(0, 12);
}

export const ClientRecord = {
	admin(token: string): AdminClient {
		return { role: 'admin', token };
	},

	regular(token: string, proposalNo: number, stream: string): RegularClient {
		return { role: 'regular', token, proposalNo, stream };
	},

	isAdmin(record: ClientRecord): record is AdminClient {
		return record.role === 'admin';
	},
};
