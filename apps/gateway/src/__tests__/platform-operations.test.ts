import { describe, expect, it } from 'vitest';
import { ExecutionContext, Result } from '@chat-gateway/domain-core';
import type { AuthContext } from '../application/authorizer.js';
import { createGetStreamTopicsUseCase } from '../application/get-stream-topics/index.js';
import { createUploadFileUseCase } from '../application/upload-file/index.js';
import { ChatPlatformError } from '../infrastructure/chat-platform.js';
import { FakeChatPlatform } from './support/fake-chat-platform.js';
import { silentLogger } from './support/logger.js';

const caller: AuthContext = { role: 'regular', keyId: 'client-key', proposalNo: 2222, stream: 'proposal 2222 stream' };
const ctx = ExecutionContext.create('client-key');

describe('UploadFileUseCase', () => {
	const file = { filename: 'notes.txt', contentType: 'text/plain', data: Buffer.from('minutes') };

	it('should return the upload receipt', async () => {
		const platform = new FakeChatPlatform();

		const result = await createUploadFileUseCase({ platform, logger: silentLogger }).execute({ caller, file }, ctx);

		expect(Result.unwrap(result)).toEqual({ result: 'success', msg: '', uri: '/user_uploads/2/ab/notes.txt' });
	});

	it('should reject an empty file', async () => {
		const platform = new FakeChatPlatform();

		const result = await createUploadFileUseCase({ platform, logger: silentLogger }).execute(
			{ caller, file: { ...file, data: Buffer.alloc(0) } },
			ctx,
		);

		expect(Result.isFailure(result) && result.error.code).toBe('FILE_EMPTY');
		expect(platform.uploads).toHaveLength(0);
	});

	it('should report a failed upload', async () => {
		const platform = new FakeChatPlatform();
		platform.uploadFailure = new ChatPlatformError('File too large', 'rejected', 'response', 400);

		const result = await createUploadFileUseCase({ platform, logger: silentLogger }).execute({ caller, file }, ctx);

		expect(Result.isFailure(result) && result.error).toEqual({
			type: 'upstream',
			code: 'ATTACHMENT_UPLOAD_FAILED',
			message: 'Attachment upload failed: File too large',
			details: { reason: 'rejected', status: 400 },
		});
	});
});

describe('GetStreamTopicsUseCase', () => {
	it("should list the topics of the caller's stream", async () => {
		const platform = new FakeChatPlatform();
		platform.streams.set('proposal 2222 stream', 7);
		platform.streams.set('other stream', 8);
		platform.topics.set(7, [{ name: 'Budget', max_id: 120 }]);
		platform.topics.set(8, [{ name: 'Secret', max_id: 130 }]);

		const result = await createGetStreamTopicsUseCase({ platform }).execute({ caller }, ctx);

		expect(Result.unwrap(result)).toEqual({
			stream: 'proposal 2222 stream',
			topics: [{ name: 'Budget', max_id: 120 }],
		});
	});

	it('should report a stream the platform does not know', async () => {
		const result = await createGetStreamTopicsUseCase({ platform: new FakeChatPlatform() }).execute({ caller }, ctx);

		expect(Result.isFailure(result) && result.error.code).toBe('UPSTREAM_REJECTED');
	});
});
