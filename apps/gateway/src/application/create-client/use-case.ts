/**
 * Create Client Use Case
 *
 * Admin-only. Mints a fresh token for a regular client scoped to one stream,
 * retrying a bounded number of times on token collision. The record is
 * durable before the token is returned, and the token is returned once.
 */

import type { UseCase } from '@chat-gateway/application';
import {
	validateAll,
	validateIntegerRange,
	validateMaxLength,
	validateNoMatch,
	validateRequired,
	Result,
	UseCaseError,
	ExecutionContext,
} from '@chat-gateway/application';
import type { Logger } from '@chat-gateway/logging';
import {
	ClientRecord,
	CONTROL_CHARACTERS,
	MAX_PROPOSAL_NO,
	MAX_STREAM_NAME_LENGTH,
	keyIdOf,
	type RegularClient,
	type TokenGenerator,
} from '../../domain/index.js';
import type { ClientRegistry, InsertOutcome } from '../../infrastructure/client-registry.js';
import { PersistenceError } from '../../infrastructure/token-store.js';
import { requireRole } from '../authorizer.js';
import type { CreateClientCommand } from './command.js';

export const DEFAULT_PROVISIONING_ATTEMPTS = 5;

export interface CreateClientUseCaseDeps {
	readonly registry: Pick<ClientRegistry, 'insert'>;
	readonly generateToken: TokenGenerator;
	readonly logger: Logger;
	/** Token generation attempts before giving up (default: 5) */
	readonly maxAttempts?: number;
}

export interface CreatedClient {
	readonly token: string;
	readonly record: RegularClient;
}

export function createCreateClientUseCase(
	deps: CreateClientUseCaseDeps,
): UseCase<CreateClientCommand, CreatedClient> {
	const { registry, generateToken } = deps;
	const maxAttempts = deps.maxAttempts ?? DEFAULT_PROVISIONING_ATTEMPTS;
	const logger = deps.logger.child({ component: 'CreateClient' });

	return {
		async execute(command: CreateClientCommand, context: ExecutionContext): Promise<Result<CreatedClient>> {
			const access = requireRole(command.caller, 'admin');
			if (Result.isFailure(access)) {
				return access;
			}

			const stream = command.stream.trim();
			const valid = validateAll(
				() => validateIntegerRange(command.proposalNo, 1, MAX_PROPOSAL_NO, 'proposal_no', 'INVALID_PROPOSAL_NO'),
				() => validateRequired(stream, 'stream', 'STREAM_REQUIRED'),
				() => validateMaxLength(stream, MAX_STREAM_NAME_LENGTH, 'stream', 'INVALID_STREAM'),
				() => validateNoMatch(stream, CONTROL_CHARACTERS, 'stream', 'INVALID_STREAM'),
			);
			if (Result.isFailure(valid)) {
				return valid;
			}

			for (let attempt = 1; attempt <= maxAttempts; attempt++) {
				const record = ClientRecord.regular(generateToken(), command.proposalNo, stream);

				let outcome: InsertOutcome<RegularClient>;
				try {
					outcome = await registry.insert(record);
				} catch (error) {
					if (error instanceof PersistenceError) {
						logger.error(
							{ err: error, correlationId: context.correlationId, proposalNo: command.proposalNo },
							'Failed to persist new client',
						);
						return Result.failure(
							UseCaseError.internal('PERSISTENCE_FAILED', 'The client could not be saved; nothing was created'),
						);
					}
					throw error;
				}

				if (outcome.status === 'committed') {
					logger.info(
						{
							correlationId: context.correlationId,
							createdBy: command.caller.keyId,
							keyId: keyIdOf(record.token),
							proposalNo: record.proposalNo,
							stream: record.stream,
							attempt,
						},
						'Client provisioned',
					);
					return Result.success({ token: record.token, record: outcome.record });
				}

				logger.warn({ correlationId: context.correlationId, attempt }, 'Generated token collided, retrying');
			}

			logger.error({ correlationId: context.correlationId, attempts: maxAttempts }, 'Token generation exhausted');
			return Result.failure(
				UseCaseError.internal(
					'PROVISIONING_EXHAUSTED',
					`Could not generate a unique token after ${maxAttempts} attempts`,
					{ attempts: maxAttempts },
				),
			);
		},
	};
}
