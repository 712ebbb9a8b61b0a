/**
 * Auth Plugin
 *
 * Resolves the client credential on every route that declares a `clientRole`
 * in its config, before body parsing and validation:
 * - no/malformed/unknown credential → 401
 * - wrong role for the route → 403
 *
 * Routes without `clientRole` (health, 404s) are public. The use cases repeat
 * the role check on the resolved caller.
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { Result } from '@chat-gateway/domain-core';
import { toErrorResponse } from '@chat-gateway/http';
import type { Logger } from '@chat-gateway/logging';
import type { ClientRole } from '../domain/index.js';
import type { AuthContext, Authorizer } from '../application/authorizer.js';

export interface AuthPluginOptions {
	authorizer: Authorizer;
	/** Lower-case name of the credential header */
	headerName: string;
	logger: Logger;
}

declare module 'fastify' {
	interface FastifyContextConfig {
		/** Role a caller needs for this route; `any` accepts every known client */
		clientRole?: ClientRole | 'any';
	}

	interface FastifyRequest {
		caller: AuthContext | null;
	}
}

const authPluginAsync: FastifyPluginAsync<AuthPluginOptions> = async (fastify, opts) => {
	const { authorizer, headerName } = opts;
	const childLogger = opts.logger.child({ component: 'Auth' });

	fastify.decorateRequest('caller', null);

	fastify.addHook('onRequest', async (request, reply) => {
		const required = request.routeOptions.config.clientRole;
		if (required === undefined) {
			return;
		}

		const authorized = authorizer.authorize(request.headers[headerName]);
		if (Result.isFailure(authorized)) {
			childLogger.debug({ code: authorized.error.code, url: request.url }, 'Rejected credential');
			return reply
				.code(401)
				.header('WWW-Authenticate', `ApiKey header="${headerName}"`)
				.send(toErrorResponse(authorized.error));
		}

		if (required !== 'any') {
			const allowed = authorizer.requireRole(authorized.value, required);
			if (Result.isFailure(allowed)) {
				childLogger.info(
					{ keyId: authorized.value.keyId, role: authorized.value.role, required, url: request.url },
					'Client lacks capability',
				);
				return reply.code(403).send(toErrorResponse(allowed.error));
			}
		}

		request.caller = authorized.value;
		request.log = request.log.child({ keyId: authorized.value.keyId });
	});
};

export const authPlugin = fp(authPluginAsync, {
	name: 'gateway-auth',
	fastify: '5.x',
});

/**
 * Get the resolved caller, throwing if the route was not protected.
 *
 * @throws Error if the route has no `clientRole` or the auth plugin is missing
 */
export function requireCaller(request: FastifyRequest): AuthContext {
	const caller = request.caller;
	if (!caller) {
		throw new Error('Caller not resolved. Ensure authPlugin is registered and the route sets config.clientRole.');
	}
	return caller;
}
