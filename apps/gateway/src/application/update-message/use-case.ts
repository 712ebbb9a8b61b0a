/**
 * Update Message Use Case
 *
 * Regular clients only. The message must live in the caller's stream; that
 * is checked on the platform before the edit, and nothing about the message
 * other than the outcome is returned.
 */

import type { UseCase } from '@chat-gateway/application';
import { validateMaxLength, Result, UseCaseError, ExecutionContext } from '@chat-gateway/application';
import type { Logger } from '@chat-gateway/logging';
import { MAX_MESSAGE_LENGTH, MAX_TOPIC_LENGTH } from '../../domain/index.js';
import type { ChatPlatform, EditReceipt } from '../../infrastructure/chat-platform.js';
import { requireRole } from '../authorizer.js';
import { callPlatform } from '../upstream-errors.js';
import type { UpdateMessageCommand } from './command.js';

export interface UpdateMessageUseCaseDeps {
	readonly platform: ChatPlatform;
	readonly logger: Logger;
}

export function createUpdateMessageUseCase(deps: UpdateMessageUseCaseDeps): UseCase<UpdateMessageCommand, EditReceipt> {
	const { platform } = deps;
	const logger = deps.logger.child({ component: 'UpdateMessage' });

	return {
		async execute(command: UpdateMessageCommand, context: ExecutionContext): Promise<Result<EditReceipt>> {
			const access = requireRole(command.caller, 'regular');
			if (Result.isFailure(access)) {
				return access;
			}
			const caller = access.value;

			const topic = command.topic?.trim() || undefined;
			const content = command.content || undefined;
			if (topic === undefined && content === undefined) {
				return Result.failure(
					UseCaseError.validation(
						'NOTHING_TO_UPDATE',
						'Either content (update message text) or topic (rename message topic) must be provided',
					),
				);
			}
			if (topic !== undefined) {
				const topicLength = validateMaxLength(topic, MAX_TOPIC_LENGTH, 'topic', 'TOPIC_TOO_LONG');
				if (Result.isFailure(topicLength)) return topicLength;
			}
			if (content !== undefined) {
				const contentLength = validateMaxLength(content, MAX_MESSAGE_LENGTH, 'content', 'CONTENT_TOO_LONG');
				if (Result.isFailure(contentLength)) return contentLength;
			}

			const scope = await callPlatform(async () => {
				const [messageStreamId, callerStreamId] = await Promise.all([
					platform.getMessageStreamId(command.messageId),
					platform.getStreamId(caller.stream),
				]);
				return messageStreamId !== null && messageStreamId === callerStreamId;
			});
			if (!scope.ok) {
				return Result.failure(scope.error);
			}
			if (!scope.value) {
				logger.warn(
					{ correlationId: context.correlationId, keyId: caller.keyId, messageId: command.messageId },
					'Refused edit of a message outside the caller stream',
				);
				return Result.failure(
					UseCaseError.forbidden('MESSAGE_OUT_OF_SCOPE', "Message is not in the client's stream", {
						messageId: command.messageId,
					}),
				);
			}

			const edited = await callPlatform(() =>
				platform.updateMessage({
					messageId: command.messageId,
					propagateMode: command.propagateMode,
					...(topic !== undefined ? { topic } : {}),
					...(content !== undefined ? { content } : {}),
				}),
			);
			if (!edited.ok) {
				return Result.failure(edited.error);
			}

			logger.info(
				{
					correlationId: context.correlationId,
					keyId: caller.keyId,
					messageId: command.messageId,
					renamed: topic !== undefined,
					edited: content !== undefined,
				},
				'Message updated',
			);
			return Result.success(edited.value);
		},
	};
}
