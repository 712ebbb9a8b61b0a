/**
 * UseCase Interface
 *
 * UseCases encapsulate a single gateway operation. Each use case:
 * - Takes a command (input data) and execution context (tracing/principal)
 * - Performs validation and capability checks
 * - Talks to the registry or the chat platform
 * - Returns a Result, never throws for expected failures
 *
 * @example
 * ```typescript
 * export function createGetStreamTopicsUseCase(deps: Deps): UseCase<GetStreamTopicsCommand, TopicList> {
 *     return {
 *         async execute(command, context) {
 *             const topics = await deps.platform.getStreamTopics(command.stream);
 *             return Result.success({ stream: command.stream, topics });
 *         },
 *     };
 * }
 * ```
 */

import type { Result, ExecutionContext } from '@chat-gateway/domain-core';
import type { Command } from './command.js';

/**
 * UseCase interface for gateway operations.
 *
 * @typeParam TCommand - The command type (input data)
 * @typeParam TResult - The value produced on success
 */
export interface UseCase<TCommand extends Command, TResult> {
	/**
	 * Execute the use case.
	 *
	 * @param command - The input command with operation data
	 * @param context - Execution context with tracing and principal information
	 */
	execute(command: TCommand, context: ExecutionContext): Promise<Result<TResult>>;
}

