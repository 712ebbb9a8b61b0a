/**
 * Client Registry
 *
 * Authoritative in-memory view of the client records, loaded once at startup.
 * Lookups read the current committed snapshot and never wait. All writes go
 * through a single-writer queue: the collision check, the durable save and the
 * swap of the snapshot happen under it, so an insert is acknowledged only
 * after the document on disk contains it.
 */

import pLimit from 'p-limit';
import type { Logger } from '@chat-gateway/logging';
import { keyIdOf, type ClientRecord } from '../domain/index.js';
import type { TokenStore } from './token-store.js';

export type InsertOutcome<T extends ClientRecord = ClientRecord> =
	| { readonly status: 'committed'; readonly record: T }
	| { readonly status: 'collision' };

/**
 * Read side of the registry, all the authorizer needs.
 */
export interface ClientLookup {
	resolve(token: string): ClientRecord | undefined;
}

export class ClientRegistry implements ClientLookup {
	private readonly writeGuard = pLimit(1);
	private readonly logger: Logger;

	private constructor(
		private readonly store: TokenStore,
		private clients: ReadonlyMap<string, ClientRecord>,
		logger: Logger,
	) {
		this.logger = logger.child({ component: 'ClientRegistry' });
	}

	/**
	 * Load the registry from its store.
	 *
	 * @throws StoreCorruptError when the persisted document is unusable
	 */
	static async open(store: TokenStore, logger: Logger): Promise<ClientRegistry> {
		const clients = await store.load();
		const registry = new ClientRegistry(store, clients, logger);
		registry.logger.info({ clients: clients.size, admin: registry.hasAdmin() }, 'Client registry loaded');
		return registry;
	}

	get size(): number {
		return this.clients.size;
	}

	resolve(token: string): ClientRecord | undefined {
		return this.clients.get(token);
	}

	hasAdmin(): boolean {
		for (const record of this.clients.values()) {
			if (record.role === 'admin') return true;
		}
		return false;
	}

	/**
	 * Add a record. Resolves `collision` if its token is already registered;
	 * otherwise persists the new mapping and only then makes it visible.
	 *
	 * @throws PersistenceError when the save fails; the registry is unchanged
	 */
	insert<T extends ClientRecord>(record: T): Promise<InsertOutcome<T>> {
		return this.writeGuard(async (): Promise<InsertOutcome<T>> => {
			if (this.clients.has(record.token)) {
				return { status: 'collision' };
			}

			const next = new Map(this.clients);
			next.set(record.token, record);
			await this.store.save(next);
			this.clients = next;

			this.logger.info({ keyId: keyIdOf(record.token), role: record.role }, 'Client registered');
			return { status: 'committed', record };
		});
	}

	/**
	 * Wait for every queued write to settle.
	 */
	async flush(): Promise<void> {
		await this.writeGuard(() => undefined);
	}
}
