import { createServer, type Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { errors, MockAgent } from 'undici';
import { Result } from '@chat-gateway/domain-core';
import { RelayTransaction } from '../application/send-message/index.js';
import { ChatPlatformError } from '../infrastructure/chat-platform.js';
import { classifyRequestError, ZulipClient } from '../infrastructure/zulip-client.js';
import { silentLogger } from './support/logger.js';

const SITE = 'https://chat.example.com';
const AUTHORIZATION = `Basic ${Buffer.from('relay-bot@example.com:test-api-key').toString('base64')}`;
const TIMEOUTS = { connectTimeoutMs: 5000, requestTimeoutMs: 30000 };

describe('ZulipClient', () => {
	let agent: MockAgent;
	let client: ZulipClient;

	beforeEach(() => {
		agent = new MockAgent();
		agent.disableNetConnect();
		client = new ZulipClient(
			{
				site: `${SITE}/`,
				email: 'relay-bot@example.com',
				apiKey: 'test-api-key',
				...TIMEOUTS,
				dispatcher: agent,
			},
			silentLogger,
		);
	});

	afterEach(async () => {
		await client.close();
		await agent.close();
	});

	it('should post a stream message with basic auth', async () => {
		let sent: URLSearchParams | undefined;
		agent
			.get(SITE)
			.intercept({
				path: '/api/v1/messages',
				method: 'POST',
				headers: (headers) => headers['authorization'] === AUTHORIZATION,
				body: (body) => {
					sent = new URLSearchParams(body);
					return true;
				},
			})
			.reply(200, { result: 'success', msg: '', id: 42 });

		const receipt = await client.sendStreamMessage({
			stream: 'proposal 2222 stream',
			topic: 'Budget',
			content: 'hello',
		});

		expect(receipt).toEqual({ result: 'success', msg: '', id: 42 });
		expect(sent?.get('type')).toBe('stream');
		expect(sent?.get('to')).toBe('proposal 2222 stream');
		expect(sent?.get('topic')).toBe('Budget');
		expect(sent?.get('content')).toBe('hello');
	});

	it('should return the uri of an upload', async () => {
		agent
			.get(SITE)
			.intercept({ path: '/api/v1/user_uploads', method: 'POST' })
			.reply(200, { result: 'success', msg: '', uri: '/user_uploads/2/ab/report.pdf' });

		const receipt = await client.uploadFile({
			filename: 'report.pdf',
			contentType: 'application/pdf',
			data: Buffer.from('%PDF-1.4'),
		});

		expect(receipt).toEqual({ result: 'success', msg: '', uri: '/user_uploads/2/ab/report.pdf' });
	});

	it('should accept the url field older servers send for uploads', async () => {
		agent
			.get(SITE)
			.intercept({ path: '/api/v1/user_uploads', method: 'POST' })
			.reply(200, { result: 'success', msg: '', url: '/user_uploads/2/cd/notes.txt' });

		const receipt = await client.uploadFile({ filename: 'notes.txt', contentType: 'text/plain', data: Buffer.from('x') });

		expect(receipt.uri).toBe('/user_uploads/2/cd/notes.txt');
	});

	it('should send only the fields of an edit that are set', async () => {
		let sent = '';
		agent
			.get(SITE)
			.intercept({
				path: '/api/v1/messages/500',
				method: 'PATCH',
				body: (body) => {
					sent = body;
					return true;
				},
			})
			.reply(200, { result: 'success', msg: '' });

		await client.updateMessage({ messageId: 500, propagateMode: 'change_all', topic: 'Renamed' });

		expect(sent).toBe('propagate_mode=change_all&topic=Renamed');
	});

	it('should read the stream of a stream message', async () => {
		agent
			.get(SITE)
			.intercept({ path: '/api/v1/messages/500', method: 'GET' })
			.reply(200, { result: 'success', msg: '', message: { type: 'stream', stream_id: 7, content: 'not relayed' } });

		expect(await client.getMessageStreamId(500)).toBe(7);
	});

	it('should report no stream for a direct message', async () => {
		agent
			.get(SITE)
			.intercept({ path: '/api/v1/messages/501', method: 'GET' })
			.reply(200, { result: 'success', msg: '', message: { type: 'private' } });

		expect(await client.getMessageStreamId(501)).toBeNull();
	});

	it('should resolve a stream name and list its topics', async () => {
		const pool = agent.get(SITE);
		pool
			.intercept({ path: (path) => path.startsWith('/api/v1/get_stream_id?'), method: 'GET' })
			.reply(200, { result: 'success', msg: '', stream_id: 7 });
		pool
			.intercept({ path: '/api/v1/users/me/7/topics', method: 'GET' })
			.reply(200, { result: 'success', msg: '', topics: [{ name: 'Budget', max_id: 120 }] });

		const streamId = await client.getStreamId('proposal 2222 stream');

		expect(streamId).toBe(7);
		expect(await client.getStreamTopics(streamId)).toEqual([{ name: 'Budget', max_id: 120 }]);
	});

	it('should classify a client error as rejected with the platform message', async () => {
		agent
			.get(SITE)
			.intercept({ path: '/api/v1/messages', method: 'POST' })
			.reply(400, { result: 'error', msg: "Stream 'gone' does not exist", code: 'STREAM_DOES_NOT_EXIST' });

		const error = await client
			.sendStreamMessage({ stream: 'gone', topic: 't', content: 'c' })
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ChatPlatformError);
		expect(error).toMatchObject({
			message: "Stream 'gone' does not exist",
			failure: 'rejected',
			phase: 'response',
			status: 400,
		});
	});

	it('should classify a server error page as unavailable', async () => {
		agent.get(SITE).intercept({ path: '/api/v1/messages', method: 'POST' }).reply(503, 'Service Unavailable');

		const error = await client
			.sendStreamMessage({ stream: 's', topic: 't', content: 'c' })
			.catch((e: unknown) => e);

		expect(error).toMatchObject({ message: 'Chat platform answered 503', failure: 'unavailable', status: 503 });
	});

	it('should treat a success response of the wrong shape as possibly delivered', async () => {
		agent.get(SITE).intercept({ path: '/api/v1/messages', method: 'POST' }).reply(200, { result: 'success', msg: '' });

		const error = await client
			.sendStreamMessage({ stream: 's', topic: 't', content: 'c' })
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ChatPlatformError);
		expect(error).toMatchObject({ failure: 'malformed', phase: 'response', status: 200, mayHaveReachedPlatform: true });
	});

	it('should treat a non-JSON success body as possibly delivered', async () => {
		agent.get(SITE).intercept({ path: '/api/v1/messages', method: 'POST' }).reply(200, 'OK');

		const error = await client
			.sendStreamMessage({ stream: 's', topic: 't', content: 'c' })
			.catch((e: unknown) => e);

		expect(error).toMatchObject({
			message: 'Chat platform answered with a non-JSON body',
			failure: 'malformed',
			status: 200,
			mayHaveReachedPlatform: true,
		});
	});

	it('should classify a non-JSON client error body as rejected', async () => {
		agent.get(SITE).intercept({ path: '/api/v1/messages', method: 'POST' }).reply(404, 'Not Found');

		const error = await client
			.sendStreamMessage({ stream: 's', topic: 't', content: 'c' })
			.catch((e: unknown) => e);

		expect(error).toMatchObject({ failure: 'rejected', status: 404, mayHaveReachedPlatform: false });
	});

	it('should report a send answered with the wrong shape as delivery unknown', async () => {
		agent.get(SITE).intercept({ path: '/api/v1/messages', method: 'POST' }).reply(200, { result: 'success', msg: '' });

		const result = await new RelayTransaction(client, { stream: 's', topic: 't', content: 'c' }).run();

		expect(Result.isFailure(result) && result.error).toMatchObject({
			type: 'upstream',
			code: 'UPSTREAM_INVALID_RESPONSE',
			details: { delivery: 'unknown', status: 200 },
		});
	});

	it('should classify a refused connection as never reaching the platform', async () => {
		agent
			.get(SITE)
			.intercept({ path: '/api/v1/messages', method: 'POST' })
			.replyWithError(Object.assign(new Error('connect ECONNREFUSED 10.0.0.1:443'), { code: 'ECONNREFUSED' }));

		const error = await client
			.sendStreamMessage({ stream: 's', topic: 't', content: 'c' })
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ChatPlatformError);
		expect(error).toMatchObject({ failure: 'unavailable', phase: 'connect', mayHaveReachedPlatform: false });
	});
});

describe('ZulipClient with a stalled response body', () => {
	let server: Server;
	let site: string;

	beforeEach(async () => {
		server = createServer((_req, res) => {
			res.writeHead(200, { 'content-type': 'application/json' });
			res.write('{"result":');
		});
		await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
		const address = server.address();
		if (address === null || typeof address === 'string') {
			throw new Error('Test server has no port');
		}
		site = `http://127.0.0.1:${address.port}`;
	});

	afterEach(async () => {
		server.closeAllConnections();
		await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
	});

	it('should report a body cut off by the deadline as a timeout with delivery unknown', async () => {
		const client = new ZulipClient(
			{ site, email: 'relay-bot@example.com', apiKey: 'test-api-key', connectTimeoutMs: 1000, requestTimeoutMs: 200 },
			silentLogger,
		);

		try {
			const result = await new RelayTransaction(client, { stream: 's', topic: 't', content: 'c' }).run();

			expect(Result.isFailure(result) && result.error).toEqual({
				type: 'timeout',
				code: 'UPSTREAM_TIMEOUT',
				message: 'Request timeout after 200ms',
				details: { delivery: 'unknown' },
			});
		} finally {
			await client.close();
		}
	});
});

describe('classifyRequestError', () => {
	it('should classify a connect timeout', () => {
		const classified = classifyRequestError(new errors.ConnectTimeoutError(), TIMEOUTS);

		expect(classified.message).toBe('Connection timeout after 5000ms');
		expect(classified.failure).toBe('timeout');
		expect(classified.phase).toBe('connect');
		expect(classified.mayHaveReachedPlatform).toBe(false);
	});

	it.each([
		['a headers timeout', new errors.HeadersTimeoutError()],
		['a body timeout', new errors.BodyTimeoutError()],
		['an expired deadline', Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })],
	])('should classify %s as a response timeout', (_label, error) => {
		const classified = classifyRequestError(error, TIMEOUTS);

		expect(classified.message).toBe('Request timeout after 30000ms');
		expect(classified.phase).toBe('response');
		expect(classified.mayHaveReachedPlatform).toBe(true);
	});

	it('should treat a dropped connection as possibly delivered', () => {
		const classified = classifyRequestError(new errors.SocketError('other side closed'), TIMEOUTS);

		expect(classified.message).toBe('Chat platform unreachable: other side closed');
		expect(classified.failure).toBe('unavailable');
		expect(classified.mayHaveReachedPlatform).toBe(true);
	});

	it('should keep the original error as the cause', () => {
		const cause = new Error('boom');

		expect(classifyRequestError(cause, TIMEOUTS).cause).toBe(cause);
	});
});
