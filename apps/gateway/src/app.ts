import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import {
	createStandardErrorHandlerOptions,
	createValidatorCompiler,
	errorHandlerPlugin,
	tracingPlugin,
} from '@chat-gateway/http';
import type { Logger } from '@chat-gateway/logging';
import {
	createAuthorizer,
	createCreateClientUseCase,
	createGetStreamTopicsUseCase,
	createSendMessageUseCase,
	createUpdateMessageUseCase,
	createUploadFileUseCase,
} from './application/index.js';
import { generateClientToken, type TokenGenerator } from './domain/index.js';
import type { ChatPlatform } from './infrastructure/chat-platform.js';
import type { ClientRegistry } from './infrastructure/client-registry.js';
import { authPlugin } from './plugins/auth-plugin.js';
import { clientRoutes } from './routes/clients.js';
import { healthRoutes } from './routes/health.js';
import { messageRoutes } from './routes/messages.js';

/**
 * Settings the HTTP surface needs, already validated.
 */
export interface GatewayConfig {
	/** Lower-case name of the credential header */
	apiKeyHeader: string;
	maxAttachmentBytes: number;
	provisioningMaxAttempts: number;
}

export interface AppDeps {
	config: GatewayConfig;
	registry: ClientRegistry;
	platform: ChatPlatform;
	logger: Logger;
	version: string;
	/** Token source for provisioning (default: 32 random bytes, base64url) */
	generateToken?: TokenGenerator;
}

/**
 * Create the Fastify application with all routes. The caller owns listening
 * and closing.
 */
export async function createApp(deps: AppDeps): Promise<FastifyInstance> {
	const { config, registry, platform, logger } = deps;

	const loggerInstance: FastifyBaseLogger = logger;
	const app = Fastify({ loggerInstance });
	app.setValidatorCompiler(createValidatorCompiler());

	await app.register(tracingPlugin);
	await app.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
	await app.register(multipart, {
		limits: {
			fileSize: config.maxAttachmentBytes,
			files: 1,
		},
	});
	await app.register(authPlugin, {
		authorizer: createAuthorizer(registry),
		headerName: config.apiKeyHeader,
		logger,
	});

	const createClient = createCreateClientUseCase({
		registry,
		generateToken: deps.generateToken ?? generateClientToken,
		logger,
		maxAttempts: config.provisioningMaxAttempts,
	});

	await app.register(healthRoutes, { prefix: '/api', version: deps.version });
	await app.register(clientRoutes, { prefix: '/api', createClient });
	await app.register(messageRoutes, {
		prefix: '/api',
		sendMessage: createSendMessageUseCase({ platform, logger }),
		uploadFile: createUploadFileUseCase({ platform, logger }),
		updateMessage: createUpdateMessageUseCase({ platform, logger }),
		getStreamTopics: createGetStreamTopicsUseCase({ platform }),
	});

	return app;
}
