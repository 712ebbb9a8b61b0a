/**
 * Zulip Client
 *
 * ChatPlatform implementation over the Zulip REST API, authenticating as a
 * bot with HTTP Basic auth. Calls are bounded by a connect timeout, header and
 * body timeouts and an overall request deadline, and failures are classified
 * so callers can tell whether a message may have been posted.
 */

import { Blob } from 'node:buffer';
import { Agent, FormData, request, type Dispatcher } from 'undici';
import { safeValidate, Type, type TSchema, type Static } from '@chat-gateway/http';
import type { Logger } from '@chat-gateway/logging';
import {
	ChatPlatformError,
	type Attachment,
	type ChatPlatform,
	type EditReceipt,
	type MessageEdit,
	type SendReceipt,
	type StreamMessage,
	type TopicSummary,
	type UploadReceipt,
} from './chat-platform.js';

export interface ZulipClientConfig {
	/** Organisation URL, e.g. https://chat.example.com */
	site: string;
	/** Bot email */
	email: string;
	/** Bot API key */
	apiKey: string;
	connectTimeoutMs: number;
	requestTimeoutMs: number;
	/** Dispatcher override; the client owns and closes its agent otherwise */
	dispatcher?: Dispatcher;
}

const ResponseEnvelope = Type.Object({
	result: Type.String(),
	msg: Type.String(),
});

const SendMessageResponse = Type.Object({
	result: Type.String(),
	msg: Type.String(),
	id: Type.Integer(),
});

const UploadResponse = Type.Object({
	result: Type.String(),
	msg: Type.String(),
	uri: Type.Optional(Type.String()),
	url: Type.Optional(Type.String()),
});

const MessageResponse = Type.Object({
	result: Type.String(),
	message: Type.Object({
		type: Type.String(),
		stream_id: Type.Optional(Type.Integer()),
	}),
});

const StreamIdResponse = Type.Object({
	result: Type.String(),
	stream_id: Type.Integer(),
});

const TopicsResponse = Type.Object({
	result: Type.String(),
	topics: Type.Array(
		Type.Object({
			name: Type.String(),
			max_id: Type.Integer(),
		}),
	),
});

/** Error codes raised before a request leaves the process. */
const CONNECT_ERROR_CODES = new Set([
	'ECONNREFUSED',
	'ENOTFOUND',
	'EAI_AGAIN',
	'EHOSTUNREACH',
	'ENETUNREACH',
	'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Map a transport error from undici onto a ChatPlatformError.
 */
export function classifyRequestError(
	error: unknown,
	timeouts: { connectTimeoutMs: number; requestTimeoutMs: number },
): ChatPlatformError {
	const name = error instanceof Error ? error.name : '';
	const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : '';

	if (name === 'ConnectTimeoutError' || code === 'UND_ERR_CONNECT_TIMEOUT') {
		const message = `Connection timeout after ${timeouts.connectTimeoutMs}ms`;
		return new ChatPlatformError(message, 'timeout', 'connect', undefined, { cause: error });
	}

	if (
		name === 'HeadersTimeoutError' ||
		name === 'BodyTimeoutError' ||
		name === 'TimeoutError' ||
		name === 'AbortError' ||
		code === 'UND_ERR_HEADERS_TIMEOUT' ||
		code === 'UND_ERR_BODY_TIMEOUT' ||
		code === 'UND_ERR_ABORTED'
	) {
		const message = `Request timeout after ${timeouts.requestTimeoutMs}ms`;
		return new ChatPlatformError(message, 'timeout', 'response', undefined, { cause: error });
	}

	const message = error instanceof Error ? error.message : String(error);
	const phase = CONNECT_ERROR_CODES.has(code) ? 'connect' : 'response';
	return new ChatPlatformError(`Chat platform unreachable: ${message}`, 'unavailable', phase, undefined, {
		cause: error,
	});
}

export class ZulipClient implements ChatPlatform {
	private readonly dispatcher: Dispatcher;
	private readonly ownsDispatcher: boolean;
	private readonly baseUrl: string;
	private readonly authorization: string;
	private readonly logger: Logger;

	constructor(
		private readonly config: ZulipClientConfig,
		logger: Logger,
	) {
		this.baseUrl = config.site.replace(/\/+$/, '');
		this.authorization = `Basic ${Buffer.from(`${config.email}:${config.apiKey}`).toString('base64')}`;
		this.logger = logger.child({ component: 'ZulipClient' });

		if (config.dispatcher) {
			this.dispatcher = config.dispatcher;
			this.ownsDispatcher = false;
		} else {
			this.dispatcher = new Agent({
				connect: {
					timeout: config.connectTimeoutMs,
				},
				headersTimeout: config.requestTimeoutMs,
				bodyTimeout: config.requestTimeoutMs,
			});
			this.ownsDispatcher = true;
		}
	}

	async sendStreamMessage(message: StreamMessage): Promise<SendReceipt> {
		const form = new URLSearchParams({
			type: 'stream',
			to: message.stream,
			topic: message.topic,
			content: message.content,
		});
		const body = await this.call('POST', '/api/v1/messages', SendMessageResponse, {
			body: form.toString(),
			contentType: 'application/x-www-form-urlencoded',
		});
		return { result: body.result, msg: body.msg, id: body.id };
	}

	async uploadFile(file: Attachment): Promise<UploadReceipt> {
		const form = new FormData();
		form.append('filename', new Blob([file.data], { type: file.contentType }), file.filename);

		const body = await this.call('POST', '/api/v1/user_uploads', UploadResponse, { body: form });
		const uri = body.uri ?? body.url;
		if (uri === undefined) {
			throw new ChatPlatformError('Upload response carried no uri', 'malformed', 'response', 200);
		}
		return { result: body.result, msg: body.msg, uri };
	}

	async updateMessage(edit: MessageEdit): Promise<EditReceipt> {
		const form = new URLSearchParams({ propagate_mode: edit.propagateMode });
		if (edit.topic !== undefined) form.set('topic', edit.topic);
		if (edit.content !== undefined) form.set('content', edit.content);

		const body = await this.call('PATCH', `/api/v1/messages/${edit.messageId}`, ResponseEnvelope, {
			body: form.toString(),
			contentType: 'application/x-www-form-urlencoded',
		});
		return { result: body.result, msg: body.msg };
	}

	async getMessageStreamId(messageId: number): Promise<number | null> {
		const body = await this.call('GET', `/api/v1/messages/${messageId}`, MessageResponse);
		return body.message.type === 'stream' ? (body.message.stream_id ?? null) : null;
	}

	async getStreamId(stream: string): Promise<number> {
		const query = new URLSearchParams({ stream });
		const body = await this.call('GET', `/api/v1/get_stream_id?${query.toString()}`, StreamIdResponse);
		return body.stream_id;
	}

	async getStreamTopics(streamId: number): Promise<TopicSummary[]> {
		const body = await this.call('GET', `/api/v1/users/me/${streamId}/topics`, TopicsResponse);
		return body.topics.map((topic) => ({ name: topic.name, max_id: topic.max_id }));
	}

	async close(): Promise<void> {
		if (this.ownsDispatcher) {
			await this.dispatcher.close();
		}
	}

	private async call<T extends TSchema>(
		method: Dispatcher.HttpMethod,
		path: string,
		schema: T,
		options: { body?: string | FormData; contentType?: string } = {},
	): Promise<Static<T>> {
		const started = Date.now();
		const headers: Record<string, string> = { authorization: this.authorization };
		if (options.contentType) {
			headers['content-type'] = options.contentType;
		}

		let response: Dispatcher.ResponseData;
		try {
			response = await request(`${this.baseUrl}${path}`, {
				method,
				headers,
				body: options.body,
				dispatcher: this.dispatcher,
				signal: AbortSignal.timeout(this.config.requestTimeoutMs),
			});
		} catch (error) {
			const classified = classifyRequestError(error, this.config);
			this.logger.warn(
				{ method, path, failure: classified.failure, phase: classified.phase, err: error },
				classified.message,
			);
			throw classified;
		}

		const status = response.statusCode;
		let payload: unknown;
		try {
			payload = await response.body.json();
		} catch (error) {
			if (!(error instanceof SyntaxError)) {
				const classified = classifyRequestError(error, this.config);
				this.logger.warn(
					{ method, path, status, failure: classified.failure, phase: classified.phase, err: error },
					classified.message,
				);
				throw classified;
			}
			if (status >= 500) {
				throw new ChatPlatformError(`Chat platform answered ${status}`, 'unavailable', 'response', status, {
					cause: error,
				});
			}
			const failure = status >= 200 && status < 300 ? 'malformed' : 'rejected';
			throw new ChatPlatformError('Chat platform answered with a non-JSON body', failure, 'response', status, {
				cause: error,
			});
		}

		this.logger.debug({ method, path, status, durationMs: Date.now() - started }, 'Chat platform call completed');

		if (status >= 500) {
			throw new ChatPlatformError(`Chat platform answered ${status}`, 'unavailable', 'response', status);
		}

		const envelope = safeValidate(payload, ResponseEnvelope);
		if (status >= 400 || (envelope.success && envelope.data.result !== 'success')) {
			const upstreamMessage = envelope.success ? envelope.data.msg : `status ${status}`;
			throw new ChatPlatformError(upstreamMessage, 'rejected', 'response', status);
		}

		const parsed = safeValidate(payload, schema);
		if (!parsed.success) {
			const message = `Unexpected chat platform response: ${parsed.error}`;
			throw new ChatPlatformError(message, 'malformed', 'response', status);
		}
		return parsed.data;
	}
}
