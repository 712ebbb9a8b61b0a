import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { badRequest, ErrorResponses, ErrorResponseSchema, safeValidate, sendResult } from '@chat-gateway/http';
import { createCommand, type UseCase } from '@chat-gateway/application';
import type {
	GetStreamTopicsCommand,
	SendMessageCommand,
	StreamTopics,
	UpdateMessageCommand,
	UploadFileCommand,
} from '../application/index.js';
import type { Attachment, EditReceipt, SendReceipt, UploadReceipt } from '../infrastructure/chat-platform.js';
import { requireCaller } from '../plugins/auth-plugin.js';
import {
	EditReceiptSchema,
	SendMessageJsonBodySchema,
	SendReceiptSchema,
	StreamTopicsResponseSchema,
	TopicQuerySchema,
	UpdateMessageJsonBodySchema,
	UpdateMessageQuerySchema,
	UploadReceiptSchema,
	type TopicQuery,
	type UpdateMessageQuery,
} from '../schemas/index.js';
import { pickFile, readMultipartForm, unexpectedFiles } from './multipart.js';
import { executionContextFor } from './request-context.js';

export interface MessageRoutesOptions {
	sendMessage: UseCase<SendMessageCommand, SendReceipt>;
	uploadFile: UseCase<UploadFileCommand, UploadReceipt>;
	updateMessage: UseCase<UpdateMessageCommand, EditReceipt>;
	getStreamTopics: UseCase<GetStreamTopicsCommand, StreamTopics>;
}

/** `image` is the field name older clients send attachments under. */
const ATTACHMENT_FIELDS = ['attachment', 'image'] as const;
const UPLOAD_FIELDS = ['file'] as const;

const UpstreamErrorResponses = {
	502: ErrorResponseSchema,
	504: ErrorResponseSchema,
} as const;

interface MessageInput {
	content: string;
	attachment?: Attachment;
}

type ParsedInput<T> = { ok: true; value: T } | { ok: false; message: string; details?: Record<string, unknown> };

/**
 * Read the message text, from a JSON `{ content }` body or a plain text body.
 * A request without a body has empty content.
 */
function readTextContent(body: unknown, schema: typeof SendMessageJsonBodySchema): ParsedInput<string> {
	if (body === undefined || body === null) {
		return { ok: true, value: '' };
	}
	if (typeof body === 'string') {
		return { ok: true, value: body };
	}
	const parsed = safeValidate(body, schema);
	if (!parsed.success) {
		return { ok: false, message: `Invalid request body: ${parsed.error}` };
	}
	return { ok: true, value: parsed.data.content ?? '' };
}

async function readMessageInput(request: FastifyRequest): Promise<ParsedInput<MessageInput>> {
	if (!request.isMultipart()) {
		const content = readTextContent(request.body, SendMessageJsonBodySchema);
		return content.ok ? { ok: true, value: { content: content.value } } : content;
	}

	const form = await readMultipartForm(request);
	const unexpected = unexpectedFiles(form, ATTACHMENT_FIELDS);
	if (unexpected.length > 0) {
		return {
			ok: false,
			message: `Unexpected file field: ${unexpected.join(', ')}`,
			details: { accepted: [...ATTACHMENT_FIELDS] },
		};
	}
	const attachment = pickFile(form, ATTACHMENT_FIELDS);
	return {
		ok: true,
		value: {
			content: form.fields.get('content') ?? '',
			...(attachment ? { attachment } : {}),
		},
	};
}

export const messageRoutes: FastifyPluginAsync<MessageRoutesOptions> = async (fastify, opts) => {
	const { sendMessage, uploadFile, updateMessage, getStreamTopics } = opts;

	fastify.post<{ Querystring: TopicQuery }>(
		'/send_message',
		{
			config: { clientRole: 'regular' },
			schema: {
				summary: "Post a message, optionally with one attachment, to the caller's stream",
				querystring: TopicQuerySchema,
				response: {
					200: SendReceiptSchema,
					...ErrorResponses,
					...UpstreamErrorResponses,
				},
			},
		},
		async (request, reply) => {
			const caller = requireCaller(request);
			const input = await readMessageInput(request);
			if (!input.ok) {
				return badRequest(reply, input.message, input.details);
			}

			const result = await sendMessage.execute(
				createCommand('SendMessage', {
					caller,
					topic: request.query.topic ?? '',
					content: input.value.content,
					...(input.value.attachment ? { attachment: input.value.attachment } : {}),
				}),
				executionContextFor(request, caller),
			);
			return sendResult(reply, result);
		},
	);

	fastify.post(
		'/upload_file',
		{
			config: { clientRole: 'regular' },
			schema: {
				summary: 'Upload a file to the chat platform and return its link',
				response: {
					200: UploadReceiptSchema,
					...ErrorResponses,
					...UpstreamErrorResponses,
				},
			},
		},
		async (request, reply) => {
			const caller = requireCaller(request);
			if (!request.isMultipart()) {
				return badRequest(reply, 'Request must be multipart/form-data with a file field');
			}

			const form = await readMultipartForm(request);
			const file = pickFile(form, UPLOAD_FIELDS);
			if (!file) {
				return badRequest(reply, 'A file is required', { field: 'file' });
			}

			const result = await uploadFile.execute(
				createCommand('UploadFile', { caller, file }),
				executionContextFor(request, caller),
			);
			return sendResult(reply, result);
		},
	);

	fastify.patch<{ Querystring: UpdateMessageQuery }>(
		'/update_message',
		{
			config: { clientRole: 'regular' },
			schema: {
				summary: "Edit the content or rename the topic of a message in the caller's stream",
				querystring: UpdateMessageQuerySchema,
				response: {
					200: EditReceiptSchema,
					...ErrorResponses,
					...UpstreamErrorResponses,
				},
			},
		},
		async (request, reply) => {
			const caller = requireCaller(request);
			const content = readTextContent(request.body, UpdateMessageJsonBodySchema);
			if (!content.ok) {
				return badRequest(reply, content.message);
			}

			const { message_id, propagate_mode, topic } = request.query;
			const result = await updateMessage.execute(
				createCommand('UpdateMessage', {
					caller,
					messageId: message_id,
					propagateMode: propagate_mode,
					...(topic !== undefined ? { topic } : {}),
					...(content.value !== '' ? { content: content.value } : {}),
				}),
				executionContextFor(request, caller),
			);
			return sendResult(reply, result);
		},
	);

	fastify.get(
		'/get_stream_topics',
		{
			config: { clientRole: 'regular' },
			schema: {
				summary: "Topics of the caller's stream",
				response: {
					200: StreamTopicsResponseSchema,
					...ErrorResponses,
					...UpstreamErrorResponses,
				},
			},
		},
		async (request, reply) => {
			const caller = requireCaller(request);
			const result = await getStreamTopics.execute(
				createCommand('GetStreamTopics', { caller }),
				executionContextFor(request, caller),
			);
			return sendResult(reply, result);
		},
	);
};
