/**
 * Upstream failure mapping shared by the chat platform use cases.
 */

import { UseCaseError } from '@chat-gateway/domain-core';
import { ChatPlatformError } from '../infrastructure/chat-platform.js';

/**
 * Whether a relayed message may exist on the platform after a failure:
 * `not_sent` when nothing was posted, `unknown` when a send was cut off
 * after leaving the gateway.
 */
export type DeliveryState = 'not_sent' | 'unknown';

export function deliveryStateOf(error: ChatPlatformError): DeliveryState {
	return error.mayHaveReachedPlatform ? 'unknown' : 'not_sent';
}

/**
 * Translate a chat platform failure into a use case error.
 */
export function toUpstreamError(error: ChatPlatformError, details: Record<string, unknown> = {}): UseCaseError {
	switch (error.failure) {
		case 'timeout':
			return UseCaseError.timeout('UPSTREAM_TIMEOUT', error.message, details);
		case 'unavailable':
			return UseCaseError.upstream('UPSTREAM_UNAVAILABLE', error.message, {
				...details,
				...(error.status !== undefined ? { status: error.status } : {}),
			});
		case 'rejected':
			return UseCaseError.upstream('UPSTREAM_REJECTED', error.message, {
				...details,
				...(error.status !== undefined ? { status: error.status } : {}),
			});
		case 'malformed':
			return UseCaseError.upstream('UPSTREAM_INVALID_RESPONSE', error.message, {
				...details,
				...(error.status !== undefined ? { status: error.status } : {}),
			});
	}
}

/**
 * Run a chat platform call, mapping its typed failures onto use case errors.
 * Anything else is a defect and propagates.
 */
export async function callPlatform<T>(
	call: () => Promise<T>,
	details: (error: ChatPlatformError) => Record<string, unknown> = () => ({}),
): Promise<{ ok: true; value: T } | { ok: false; error: UseCaseError; cause: ChatPlatformError }> {
	try {
		return { ok: true, value: await call() };
	} catch (error) {
		if (error instanceof ChatPlatformError) {
			return { ok: false, error: toUpstreamError(error, details(error)), cause: error };
		}
		throw error;
	}
}
