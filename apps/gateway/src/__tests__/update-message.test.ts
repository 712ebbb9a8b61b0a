import { beforeEach, describe, expect, it } from 'vitest';
import { ExecutionContext, Result } from '@chat-gateway/domain-core';
import type { AuthContext } from '../application/authorizer.js';
import { createUpdateMessageUseCase } from '../application/update-message/index.js';
import { FakeChatPlatform } from './support/fake-chat-platform.js';
import { silentLogger } from './support/logger.js';

const caller: AuthContext = { role: 'regular', keyId: 'client-key', proposalNo: 2222, stream: 'proposal 2222 stream' };
const ctx = ExecutionContext.create('client-key');

describe('UpdateMessageUseCase', () => {
	let platform: FakeChatPlatform;

	beforeEach(() => {
		platform = new FakeChatPlatform();
		platform.streams.set('proposal 2222 stream', 7);
		platform.messages.set(500, 7);
		platform.messages.set(501, 8);
		platform.messages.set(502, null);
	});

	function useCase() {
		return createUpdateMessageUseCase({ platform, logger: silentLogger });
	}

	it("should edit a message in the caller's stream", async () => {
		const result = await useCase().execute(
			{ caller, messageId: 500, propagateMode: 'change_one', content: 'corrected' },
			ctx,
		);

		expect(Result.unwrap(result)).toEqual({ result: 'success', msg: '' });
		expect(platform.edits).toEqual([{ messageId: 500, propagateMode: 'change_one', content: 'corrected' }]);
	});

	it('should rename a topic without touching the content', async () => {
		await useCase().execute({ caller, messageId: 500, propagateMode: 'change_all', topic: ' Renamed ' }, ctx);

		expect(platform.edits).toEqual([{ messageId: 500, propagateMode: 'change_all', topic: 'Renamed' }]);
	});

	it('should refuse a message from another stream', async () => {
		const result = await useCase().execute(
			{ caller, messageId: 501, propagateMode: 'change_one', content: 'hijack' },
			ctx,
		);

		expect(Result.isFailure(result) && result.error).toEqual({
			type: 'forbidden',
			code: 'MESSAGE_OUT_OF_SCOPE',
			message: "Message is not in the client's stream",
			details: { messageId: 501 },
		});
		expect(platform.edits).toHaveLength(0);
	});

	it('should refuse a direct message', async () => {
		const result = await useCase().execute({ caller, messageId: 502, propagateMode: 'change_one', content: 'x' }, ctx);

		expect(Result.isFailure(result) && result.error.code).toBe('MESSAGE_OUT_OF_SCOPE');
	});

	it('should require content or a topic', async () => {
		const result = await useCase().execute({ caller, messageId: 500, propagateMode: 'change_one', topic: '  ' }, ctx);

		expect(Result.isFailure(result) && result.error.code).toBe('NOTHING_TO_UPDATE');
		expect(platform.edits).toHaveLength(0);
	});

	it('should surface an unknown message as an upstream rejection', async () => {
		const result = await useCase().execute({ caller, messageId: 999, propagateMode: 'change_one', content: 'x' }, ctx);

		expect(Result.isFailure(result) && result.error).toEqual({
			type: 'upstream',
			code: 'UPSTREAM_REJECTED',
			message: 'Invalid message(s)',
			details: { status: 400 },
		});
	});

	it('should refuse an admin caller', async () => {
		const result = await useCase().execute(
			{ caller: { role: 'admin', keyId: 'admin-key' }, messageId: 500, propagateMode: 'change_one', content: 'x' },
			ctx,
		);

		expect(Result.isFailure(result) && result.error.code).toBe('REGULAR_CLIENT_REQUIRED');
	});
});
