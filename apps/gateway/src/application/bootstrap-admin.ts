/**
 * Admin bootstrap
 *
 * A fresh deployment has no admin token and so no way to provision clients.
 * At startup, if the registry holds no admin, one is minted and persisted
 * through the ordinary insert path. The token is never logged; operators
 * read it from the clients document.
 */

import type { Logger } from '@chat-gateway/logging';
import { ClientRecord, keyIdOf, type TokenGenerator } from '../domain/index.js';
import type { ClientRegistry } from '../infrastructure/client-registry.js';

export type BootstrapOutcome = 'existing' | 'created' | 'disabled';

export interface BootstrapAdminOptions {
	readonly enabled: boolean;
	readonly generateToken: TokenGenerator;
	readonly maxAttempts: number;
	readonly clientsFile: string;
}

/**
 * @throws Error when no unique token could be generated
 * @throws PersistenceError when the admin record could not be saved
 */
export async function bootstrapAdmin(
	registry: Pick<ClientRegistry, 'hasAdmin' | 'insert'>,
	options: BootstrapAdminOptions,
	logger: Logger,
): Promise<BootstrapOutcome> {
	if (registry.hasAdmin()) {
		return 'existing';
	}
	if (!options.enabled) {
		logger.warn('No admin client registered and bootstrap is disabled; clients cannot be provisioned');
		return 'disabled';
	}

	for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
		const outcome = await registry.insert(ClientRecord.admin(options.generateToken()));
		if (outcome.status === 'committed') {
			logger.warn(
				{ keyId: keyIdOf(outcome.record.token), clientsFile: options.clientsFile },
				'Bootstrapped admin client; read its token from the clients file',
			);
			return 'created';
		}
	}

	throw new Error(`Could not generate a unique admin token after ${options.maxAttempts} attempts`);
}
