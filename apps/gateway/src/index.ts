import { readFileSync } from 'node:fs';
import { createLogger } from '@chat-gateway/logging';
import type { FastifyInstance } from 'fastify';
import { bootstrapAdmin } from './application/index.js';
import { generateClientToken } from './domain/index.js';
import { ClientRegistry } from './infrastructure/client-registry.js';
import { JsonFileTokenStore, StoreCorruptError } from './infrastructure/token-store.js';
import { ZulipClient } from './infrastructure/zulip-client.js';
import { env } from './env.js';
import { createApp } from './app.js';

function readVersion(): string {
	const text = readFileSync(new URL('../package.json', import.meta.url), 'utf-8');
	const parsed: unknown = JSON.parse(text);
	if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
		return parsed.version;
	}
	return '0.0.0';
}

const logger = createLogger({
	level: env.LOG_LEVEL,
	serviceName: 'chat-gateway',
	pretty: env.NODE_ENV === 'development',
	redact: [`req.headers["${env.API_KEY_HEADER}"]`],
});

/**
 * Start the gateway: load the client registry, make sure an admin exists,
 * and listen.
 */
export async function startGateway(): Promise<{ server: FastifyInstance; registry: ClientRegistry; platform: ZulipClient }> {
	const store = new JsonFileTokenStore(env.CLIENTS_FILE);
	const registry = await ClientRegistry.open(store, logger);

	await bootstrapAdmin(
		registry,
		{
			enabled: env.BOOTSTRAP_ADMIN,
			generateToken: generateClientToken,
			maxAttempts: env.PROVISIONING_MAX_ATTEMPTS,
			clientsFile: env.CLIENTS_FILE,
		},
		logger,
	);

	const platform = new ZulipClient(
		{
			site: env.ZULIP_SITE,
			email: env.ZULIP_EMAIL,
			apiKey: env.ZULIP_API_KEY,
			connectTimeoutMs: env.UPSTREAM_CONNECT_TIMEOUT_MS,
			requestTimeoutMs: env.UPSTREAM_REQUEST_TIMEOUT_MS,
		},
		logger,
	);

	const server = await createApp({
		config: {
			apiKeyHeader: env.API_KEY_HEADER,
			maxAttachmentBytes: env.MAX_ATTACHMENT_BYTES,
			provisioningMaxAttempts: env.PROVISIONING_MAX_ATTEMPTS,
		},
		registry,
		platform,
		logger,
		version: readVersion(),
	});

	await server.listen({ port: env.PORT, host: env.HOST });

	logger.info(
		{
			host: env.HOST,
			port: env.PORT,
			env: env.NODE_ENV,
			clientsFile: env.CLIENTS_FILE,
			clients: registry.size,
		},
		'Chat gateway started',
	);

	return { server, registry, platform };
}

// Run when executed as main module
const isMainModule =
	typeof process !== 'undefined' &&
	process.argv[1] !== undefined &&
	(process.argv[1].endsWith('/index.ts') || process.argv[1].endsWith('/index.js'));

if (isMainModule) {
	let started: Awaited<ReturnType<typeof startGateway>>;
	try {
		started = await startGateway();
	} catch (error) {
		if (error instanceof StoreCorruptError) {
			logger.fatal({ err: error, clientsFile: error.filePath }, 'Refusing to start with a corrupt clients document');
		} else {
			logger.fatal({ err: error }, 'Gateway failed to start');
		}
		process.exit(1);
	}
	const { server, registry, platform } = started;

	// Graceful shutdown
	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) return;
		shuttingDown = true;

		logger.info({ signal }, 'Shutdown signal received');

		const forceShutdown = setTimeout(() => {
			logger.error('Forced shutdown after timeout');
			process.exit(1);
		}, 15_000);
		forceShutdown.unref();

		// 1. Stop accepting HTTP requests; in-flight requests finish
		await server.close();

		// 2. Let any queued registry write reach disk
		await registry.flush();

		// 3. Release upstream connections
		await platform.close();

		logger.info('Graceful shutdown complete');
		process.exit(0);
	};

	const onSignal = (signal: string) => {
		shutdown(signal).catch((error: unknown) => {
			logger.error({ err: error }, 'Shutdown failed');
			process.exit(1);
		});
	};
	process.on('SIGINT', () => onSignal('SIGINT'));
	process.on('SIGTERM', () => onSignal('SIGTERM'));
}
