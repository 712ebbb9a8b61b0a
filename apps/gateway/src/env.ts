import { parseEnv, CommonEnvSchemas, z } from '@chat-gateway/config';

/**
 * Gateway environment configuration
 */
export const envSchema = z.object({
	// Server
	PORT: CommonEnvSchemas.port,
	HOST: z.string().default('0.0.0.0'),
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,

	// Client registry
	/**
	 * Path of the JSON document mapping tokens to client records.
	 * Default: config/clients.json (relative to the working directory)
	 */
	CLIENTS_FILE: z.string().min(1).default('config/clients.json'),

	/**
	 * Header carrying the client credential.
	 * Default: x-api-key
	 */
	API_KEY_HEADER: z
		.string()
		.min(1)
		.transform((v) => v.toLowerCase())
		.prefault('x-api-key'),

	/**
	 * Token generation attempts before provisioning gives up.
	 * Default: 5
	 */
	PROVISIONING_MAX_ATTEMPTS: CommonEnvSchemas.positiveInt.prefault('5'),

	/**
	 * Mint an admin token at startup when the registry holds none.
	 * Default: true
	 */
	BOOTSTRAP_ADMIN: CommonEnvSchemas.boolean.prefault('true'),

	// Zulip
	ZULIP_SITE: CommonEnvSchemas.url,
	ZULIP_EMAIL: z.string().min(1),
	ZULIP_API_KEY: z.string().min(1),

	/**
	 * How long to wait for a TCP/TLS connection to the chat platform.
	 * Default: 5000ms
	 */
	UPSTREAM_CONNECT_TIMEOUT_MS: CommonEnvSchemas.durationMs.prefault('5000'),

	/**
	 * Overall deadline for one chat platform call, headers and body included.
	 * Default: 30000ms
	 */
	UPSTREAM_REQUEST_TIMEOUT_MS: CommonEnvSchemas.durationMs.prefault('30000'),

	/**
	 * Largest accepted attachment.
	 * Default: 25 MiB
	 */
	MAX_ATTACHMENT_BYTES: CommonEnvSchemas.positiveInt.prefault(String(25 * 1024 * 1024)),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = parseEnv(envSchema);
