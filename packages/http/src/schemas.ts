/**
 * Schema Utilities
 *
 * TypeBox schemas shared by the routes. Fastify validates request bodies and
 * query strings against them through AJV and infers handler types from them.
 */

import { Type, type Static, type TSchema, type TObject } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Common TypeBox schemas for gateway APIs.
 */
export const CommonSchemas = {
	/**
	 * Chat platform message id.
	 */
	MessageId: Type.Integer({
		minimum: 1,
		description: 'Chat platform message id',
	}),
};

/**
 * Standard error response schema.
 */
export const ErrorResponseSchema = Type.Object({
	message: Type.String({ description: 'Human-readable error message' }),
	code: Type.String({ description: 'Machine-readable error code' }),
	details: Type.Optional(Type.Record(Type.String(), Type.Unknown(), { description: 'Additional error details' })),
});

export type ErrorResponseType = Static<typeof ErrorResponseSchema>;

/**
 * Response schemas for the error statuses every authenticated route can produce.
 */
export const ErrorResponses = {
	400: ErrorResponseSchema,
	401: ErrorResponseSchema,
	403: ErrorResponseSchema,
	500: ErrorResponseSchema,
} as const;

/**
 * Safe validation that returns a Result-like object instead of throwing.
 * Fastify validates automatically when schemas are provided in route config;
 * this is for values assembled by hand, such as multipart fields.
 */
export function safeValidate<T extends TSchema>(
	data: unknown,
	schema: T,
): { success: true; data: Static<T> } | { success: false; error: string } {
	if (Value.Check(schema, data)) {
		return { success: true, data };
	}
	const errors = [...Value.Errors(schema, data)];
	const message = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
	return { success: false, error: message };
}

// Re-export TypeBox for convenience
export { Type, Value, type Static, type TSchema, type TObject };
