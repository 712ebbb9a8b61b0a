/**
 * Validation Utilities
 *
 * Helper functions for common validation patterns in use cases.
 * All validation functions return Result types for consistent error handling.
 *
 * @example
 * ```typescript
 * const topicResult = validateRequired(command.topic, 'topic', 'TOPIC_REQUIRED');
 * if (Result.isFailure(topicResult)) return topicResult;
 *
 * const lengthResult = validateMaxLength(command.topic, 60, 'topic', 'TOPIC_TOO_LONG');
 * if (Result.isFailure(lengthResult)) return lengthResult;
 * ```
 */

import { Result, UseCaseError } from '@chat-gateway/domain-core';

/**
 * Validate that a value is not null, undefined, or a blank string.
 *
 * @param fieldName - The field name for error details
 * @param errorCode - The error code if validation fails
 * @param errorMessage - Optional custom error message
 */
export function validateRequired<T>(
	value: T | null | undefined,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<NonNullable<T>> {
	if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} is required`, { field: fieldName }),
		);
	}

	return Result.success(value);
}

/**
 * Validate that a string does NOT match a pattern of forbidden characters.
 */
export function validateNoMatch(
	value: string,
	pattern: RegExp,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<string> {
	if (pattern.test(value)) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} contains invalid characters`, {
				field: fieldName,
			}),
		);
	}

	return Result.success(value);
}

/**
 * Validate that a string does not exceed a maximum length.
 *
 * @param maxLength - The maximum allowed length
 * @param fieldName - The field name for error details
 * @param errorCode - The error code if validation fails
 */
export function validateMaxLength(
	value: string,
	maxLength: number,
	fieldName: string,
	errorCode: string,
): Result<string> {
	if (value.length > maxLength) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be ${maxLength} characters or less`, {
				field: fieldName,
				length: value.length,
				maxLength,
			}),
		);
	}

	return Result.success(value);
}

/**
 * Validate that a value is a whole number within a range.
 *
 * @param min - The minimum allowed value
 * @param max - The maximum allowed value
 */
export function validateIntegerRange(
	value: number,
	min: number,
	max: number,
	fieldName: string,
	errorCode: string,
): Result<number> {
	if (!Number.isInteger(value) || value < min || value > max) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be an integer between ${min} and ${max}`, {
				field: fieldName,
				value,
				min,
				max,
			}),
		);
	}

	return Result.success(value);
}

/**
 * Chain multiple validations together.
 * Stops at the first failure.
 *
 * @example
 * ```typescript
 * const result = validateAll(
 *     () => validateRequired(command.stream, 'stream', 'STREAM_REQUIRED'),
 *     () => validateMaxLength(command.stream, 60, 'stream', 'STREAM_TOO_LONG'),
 * );
 * if (Result.isFailure(result)) return result;
 * ```
 */
export function validateAll(...validations: Array<() => Result<unknown>>): Result<void> {
	for (const validation of validations) {
		const result = validation();
		if (Result.isFailure(result)) {
			return Result.failure(result.error);
		}
	}

	return Result.success(undefined);
}
