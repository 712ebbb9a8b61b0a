/**
 * Send Message Use Case
 *
 * Regular clients only. Forwards one message, with an optional attachment,
 * to the stream bound to the caller. No automatic retry.
 */

import type { UseCase } from '@chat-gateway/application';
import {
	validateMaxLength,
	validateRequired,
	Result,
	UseCaseError,
	ExecutionContext,
} from '@chat-gateway/application';
import type { Logger } from '@chat-gateway/logging';
import { MAX_MESSAGE_LENGTH, MAX_TOPIC_LENGTH } from '../../domain/index.js';
import type { ChatPlatform, SendReceipt } from '../../infrastructure/chat-platform.js';
import { requireRole } from '../authorizer.js';
import type { SendMessageCommand } from './command.js';
import { RelayTransaction } from './relay-transaction.js';

export interface SendMessageUseCaseDeps {
	readonly platform: ChatPlatform;
	readonly logger: Logger;
}

export function createSendMessageUseCase(deps: SendMessageUseCaseDeps): UseCase<SendMessageCommand, SendReceipt> {
	const { platform } = deps;
	const logger = deps.logger.child({ component: 'MessageRelay' });

	return {
		async execute(command: SendMessageCommand, context: ExecutionContext): Promise<Result<SendReceipt>> {
			const access = requireRole(command.caller, 'regular');
			if (Result.isFailure(access)) {
				return access;
			}
			const caller = access.value;

			const topic = command.topic.trim();
			const topicResult = validateRequired(topic, 'topic', 'TOPIC_REQUIRED');
			if (Result.isFailure(topicResult)) {
				return topicResult;
			}
			const topicLength = validateMaxLength(topic, MAX_TOPIC_LENGTH, 'topic', 'TOPIC_TOO_LONG');
			if (Result.isFailure(topicLength)) {
				return topicLength;
			}

			if (!command.attachment && command.content.trim() === '') {
				return Result.failure(
					UseCaseError.validation('CONTENT_REQUIRED', 'content is required unless a file is attached', {
						field: 'content',
					}),
				);
			}
			const contentLength = validateMaxLength(command.content, MAX_MESSAGE_LENGTH, 'content', 'CONTENT_TOO_LONG');
			if (Result.isFailure(contentLength)) {
				return contentLength;
			}

			const transaction = new RelayTransaction(platform, {
				stream: caller.stream,
				topic,
				content: command.content,
				...(command.attachment ? { attachment: command.attachment } : {}),
			});
			const result = await transaction.run();

			const relayLog = {
				correlationId: context.correlationId,
				keyId: caller.keyId,
				proposalNo: caller.proposalNo,
				stream: caller.stream,
				topic,
			};
			const state = transaction.state;
			switch (state.phase) {
				case 'sent':
					logger.info({ ...relayLog, messageId: state.receipt.id, attachment: state.upload !== null }, 'Message relayed');
					break;
				case 'upload-failed':
					logger.warn({ ...relayLog, code: state.error.code, details: state.error.details }, 'Attachment upload failed');
					break;
				case 'send-failed':
					logger.warn(
						{
							...relayLog,
							code: state.error.code,
							details: state.error.details,
							uploadedNotSent: state.upload?.uri,
						},
						'Message relay failed',
					);
					break;
				case 'pending':
				case 'uploaded-not-sent':
					logger.error({ ...relayLog, phase: state.phase }, 'Relay transaction ended in an intermediate state');
					break;
			}

			return result;
		},
	};
}
