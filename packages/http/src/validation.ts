import { Ajv, type Options } from 'ajv';
import type { FastifySchemaCompiler } from 'fastify';
import type { TSchema } from '@sinclair/typebox';

/** Fastify's own AJV defaults, less type coercion. */
const BASE_OPTIONS: Options = {
	useDefaults: true,
	removeAdditional: true,
	allErrors: false,
	strict: false,
};

/**
 * Validator compiler that coerces path, query and header values, which arrive
 * as text, but checks JSON bodies exactly as sent: `"2222"` is not a number.
 */
export function createValidatorCompiler(): FastifySchemaCompiler<TSchema> {
	const bodyAjv = new Ajv({ ...BASE_OPTIONS, coerceTypes: false });
	const textAjv = new Ajv({ ...BASE_OPTIONS, coerceTypes: 'array' });

	return ({ schema, httpPart }) => (httpPart === 'body' ? bodyAjv : textAjv).compile(schema);
}
