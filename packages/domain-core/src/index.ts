/**
 * @chat-gateway/domain-core
 *
 * Core domain infrastructure shared by the gateway packages:
 * - Result type for use case outcomes
 * - Use case error types with HTTP status mapping
 * - Execution context for log correlation
 *
 * @example
 * ```typescript
 * import { Result, UseCaseError, ExecutionContext } from '@chat-gateway/domain-core';
 *
 * const ctx = ExecutionContext.create('proposal:2222');
 *
 * if (topic.trim() === '') {
 *     return Result.failure(UseCaseError.validation('TOPIC_REQUIRED', 'topic is required'));
 * }
 * ```
 */

export {
	UseCaseError,
	type UseCaseErrorBase,
	type UseCaseErrorType,
	type ValidationError,
	type UnauthorizedError,
	type ForbiddenError,
	type UpstreamError,
	type TimeoutError,
	type InternalError,
} from './errors.js';

export { Result, isSuccess, isFailure, type Success, type Failure } from './result.js';

export { ExecutionContext } from './execution-context.js';
