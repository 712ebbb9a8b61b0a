import type { FastifyPluginAsync } from 'fastify';
import { HealthResponseSchema } from '../schemas/index.js';

export interface HealthRoutesOptions {
	version: string;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, opts) => {
	fastify.get(
		'/health',
		{
			schema: {
				summary: 'Liveness probe',
				response: {
					200: HealthResponseSchema,
				},
			},
		},
		() => ({
			status: 'OK' as const,
			version: opts.version,
			uptime_seconds: Math.round(process.uptime()),
		}),
	);
};
