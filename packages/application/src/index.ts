/**
 * @chat-gateway/application
 *
 * Application layer patterns for the gateway:
 * - Command types for operation inputs
 * - UseCase interfaces for gateway operations
 * - Validation utilities for input validation
 */

// Command types
export { type Command, createCommand } from './command.js';

// UseCase interfaces
export { type UseCase } from './use-case.js';

// Validation utilities
export {
	validateRequired,
	validateNoMatch,
	validateMaxLength,
	validateIntegerRange,
	validateAll,
} from './validation.js';

// Re-export commonly used types from domain-core for convenience
export {
	Result,
	isSuccess,
	isFailure,
	type Success,
	type Failure,
	UseCaseError,
	ExecutionContext,
} from '@chat-gateway/domain-core';
