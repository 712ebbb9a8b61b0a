/**
 * @chat-gateway/http
 *
 * HTTP layer utilities for the gateway using Fastify:
 * - Tracing plugin with request-scoped loggers
 * - Result to HTTP response mapping
 * - Global error handler with pluggable mappers
 * - TypeBox schema utilities
 *
 * @example
 * ```typescript
 * const fastify = Fastify({ loggerInstance: logger });
 *
 * await fastify.register(tracingPlugin);
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 *
 * fastify.post('/api/create_client', async (request, reply) => {
 *     const result = await createClient.execute(command, ctx);
 *     return sendResult(reply, result, { successStatus: 201 });
 * });
 * ```
 */

// Types
export {
	type TracingData,
	type TracingPluginOptions,
	type ErrorResponse,
	type FastifyRequest,
	type FastifyReply,
	type Logger,
} from './types.js';

// Plugins
export { tracingPlugin, requireTracing } from './plugins/index.js';

// Logging
export { createRequestLogger } from './logging.js';

// Response utilities
export {
	getErrorStatus,
	toErrorResponse,
	sendResult,
	sendError,
	badRequest,
	type SendResultOptions,
} from './response.js';

// Validation
export { createValidatorCompiler } from './validation.js';

// Error handler
export {
	errorHandlerPlugin,
	createCommonErrorMappers,
	createStandardErrorHandlerOptions,
	type ErrorHandlerConfig,
	type ErrorMapper,
} from './error-handler.js';

// Schema utilities
export {
	CommonSchemas,
	ErrorResponseSchema,
	ErrorResponses,
	type ErrorResponseType,
	safeValidate,
	Type,
	Value,
	type Static,
	type TSchema,
	type TObject,
} from './schemas.js';
