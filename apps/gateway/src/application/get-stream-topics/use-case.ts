/**
 * Get Stream Topics Use Case
 *
 * Regular clients only. Lists the topics of the caller's own stream.
 */

import type { UseCase } from '@chat-gateway/application';
import { Result, ExecutionContext } from '@chat-gateway/application';
import type { ChatPlatform, TopicSummary } from '../../infrastructure/chat-platform.js';
import { requireRole } from '../authorizer.js';
import { callPlatform } from '../upstream-errors.js';
import type { GetStreamTopicsCommand } from './command.js';

export interface GetStreamTopicsUseCaseDeps {
	readonly platform: ChatPlatform;
}

export interface StreamTopics {
	readonly stream: string;
	readonly topics: TopicSummary[];
}

export function createGetStreamTopicsUseCase(
	deps: GetStreamTopicsUseCaseDeps,
): UseCase<GetStreamTopicsCommand, StreamTopics> {
	const { platform } = deps;

	return {
		async execute(command: GetStreamTopicsCommand, _context: ExecutionContext): Promise<Result<StreamTopics>> {
			const access = requireRole(command.caller, 'regular');
			if (Result.isFailure(access)) {
				return access;
			}
			const { stream } = access.value;

			const topics = await callPlatform(async () => platform.getStreamTopics(await platform.getStreamId(stream)));
			if (!topics.ok) {
				return Result.failure(topics.error);
			}
			return Result.success({ stream, topics: topics.value });
		},
	};
}
