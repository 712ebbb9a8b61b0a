import type { FastifyPluginAsync } from 'fastify';
import { ErrorResponses, sendResult } from '@chat-gateway/http';
import { createCommand, type UseCase } from '@chat-gateway/application';
import type { CreateClientCommand, CreatedClient } from '../application/index.js';
import { requireCaller } from '../plugins/auth-plugin.js';
import { CreateClientBodySchema, CreatedClientResponseSchema, MeResponseSchema, type CreateClientBody } from '../schemas/index.js';
import { executionContextFor } from './request-context.js';

export interface ClientRoutesOptions {
	createClient: UseCase<CreateClientCommand, CreatedClient>;
}

export const clientRoutes: FastifyPluginAsync<ClientRoutesOptions> = async (fastify, opts) => {
	const { createClient } = opts;

	fastify.post<{ Body: CreateClientBody }>(
		'/create_client',
		{
			config: { clientRole: 'admin' },
			schema: {
				summary: 'Provision a regular client bound to one stream',
				body: CreateClientBodySchema,
				response: {
					201: CreatedClientResponseSchema,
					...ErrorResponses,
				},
			},
		},
		async (request, reply) => {
			const caller = requireCaller(request);
			const result = await createClient.execute(
				createCommand('CreateClient', { caller, proposalNo: request.body.proposal_no, stream: request.body.stream }),
				executionContextFor(request, caller),
			);
			return sendResult(reply, result, {
				successStatus: 201,
				transform: (created) => ({
					token: created.token,
					proposal_no: created.record.proposalNo,
					stream: created.record.stream,
				}),
			});
		},
	);

	fastify.get(
		'/me',
		{
			config: { clientRole: 'any' },
			schema: {
				summary: "The caller's own client record, without its token",
				response: {
					200: MeResponseSchema,
					401: ErrorResponses[401],
				},
			},
		},
		async (request) => {
			const caller = requireCaller(request);
			if (caller.role === 'admin') {
				return { role: caller.role, key_id: caller.keyId };
			}
			return { role: caller.role, key_id: caller.keyId, proposal_no: caller.proposalNo, stream: caller.stream };
		},
	);
};
