import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Paths that may carry a client credential. Values at these paths are
 * replaced with `[Redacted]` before a record is written.
 */
export const CREDENTIAL_REDACT_PATHS: readonly string[] = [
	'token',
	'apiKey',
	'*.token',
	'*.apiKey',
	'req.headers.authorization',
	'req.headers["x-api-key"]',
];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level */
	level: LogLevel | 'silent';
	/** Service name for structured logs */
	serviceName: string;
	/** Whether to use pretty printing (dev only) */
	pretty?: boolean;
	/** Additional base context */
	base?: Record<string, unknown>;
	/** Extra redaction paths on top of {@link CREDENTIAL_REDACT_PATHS} */
	redact?: readonly string[];
	/** Write to this stream instead of stdout (ignored when pretty) */
	destination?: DestinationStream;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
		redact: {
			paths: [...CREDENTIAL_REDACT_PATHS, ...(config.redact ?? [])],
		},
	};

	// Use pino-pretty for development
	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		});
	}

	if (config.destination) {
		return pino(options, config.destination);
	}

	return pino(options);
}

