/**
 * Token Store
 *
 * Durable mapping of token → client record, kept in one JSON document:
 *
 * ```json
 * {
 *   "<token>": { "proposal_no": 2222, "stream": "proposal 2222 stream" },
 *   "<admin token>": { "admin": true }
 * }
 * ```
 *
 * Every save rewrites the whole document through a temporary file in the same
 * directory, fsync and rename, so a reader only ever sees a complete document.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import pLimit from 'p-limit';
import { z } from '@chat-gateway/config';
import { ClientRecord, MAX_TOKEN_LENGTH, TOKEN_PATTERN } from '../domain/index.js';

const AdminEntrySchema = z.strictObject({
	admin: z.literal(true),
});

const RegularEntrySchema = z.strictObject({
	proposal_no: z.number().int().positive(),
	stream: z.string().min(1),
});

const TokenDocumentSchema = z.record(
	z.string().max(MAX_TOKEN_LENGTH).regex(TOKEN_PATTERN),
	z.union([AdminEntrySchema, RegularEntrySchema]),
);

export type TokenDocument = z.infer<typeof TokenDocumentSchema>;
type TokenDocumentEntry = TokenDocument[string];

/**
 * The persisted document exists but cannot be trusted. The gateway refuses
 * to start rather than overwrite it.
 */
export class StoreCorruptError extends Error {
	constructor(
		readonly filePath: string,
		readonly reason: string,
		options?: ErrorOptions,
	) {
		super(`Client document ${filePath} is corrupt: ${reason}`, options);
		this.name = 'StoreCorruptError';
	}
}

/**
 * A save did not complete. The previous document is still in place.
 */
export class PersistenceError extends Error {
	constructor(
		readonly filePath: string,
		options?: ErrorOptions,
	) {
		super(`Failed to persist client document ${filePath}`, options);
		this.name = 'PersistenceError';
	}
}

/**
 * Persistence seam for the client registry.
 */
export interface TokenStore {
	load(): Promise<Map<string, ClientRecord>>;
	save(clients: ReadonlyMap<string, ClientRecord>): Promise<void>;
}

function toRecord(token: string, entry: TokenDocumentEntry): ClientRecord {
	if ('admin' in entry) {
		return ClientRecord.admin(token);
	}
	return ClientRecord.regular(token, entry.proposal_no, entry.stream);
}

function toEntry(record: ClientRecord): TokenDocumentEntry {
	if (record.role === 'admin') {
		return { admin: true };
	}
	return { proposal_no: record.proposalNo, stream: record.stream };
}

/**
 * Decode a document's text into client records.
 *
 * @throws StoreCorruptError when the text is not a well-formed document
 */
export function decodeTokenDocument(filePath: string, text: string): Map<string, ClientRecord> {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		throw new StoreCorruptError(filePath, 'not valid JSON', { cause: error });
	}

	const parsed = TokenDocumentSchema.safeParse(raw);
	if (!parsed.success) {
		const first = parsed.error.issues[0];
		const where = first && first.path.length > 0 ? ` at ${first.path.map(String).join('.')}` : '';
		throw new StoreCorruptError(filePath, `${first?.message ?? 'invalid document'}${where}`);
	}

	const clients = new Map<string, ClientRecord>();
	for (const [token, entry] of Object.entries(parsed.data)) {
		clients.set(token, toRecord(token, entry));
	}
	return clients;
}

/**
 * Encode client records as document text, in registry insertion order.
 */
export function encodeTokenDocument(clients: ReadonlyMap<string, ClientRecord>): string {
	const document: TokenDocument = {};
	for (const [token, record] of clients) {
		document[token] = toEntry(record);
	}
	return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Token store backed by a JSON file.
 */
export class JsonFileTokenStore implements TokenStore {
	private readonly writeQueue = pLimit(1);

	constructor(readonly filePath: string) {}

	/**
	 * Read the document. An absent file yields an empty registry.
	 *
	 * @throws StoreCorruptError when the file exists but is not a valid document
	 */
	async load(): Promise<Map<string, ClientRecord>> {
		let text: string;
		try {
			text = await readFile(this.filePath, 'utf8');
		} catch (error) {
			if (isNotFound(error)) {
				return new Map();
			}
			throw error;
		}
		return decodeTokenDocument(this.filePath, text);
	}

	/**
	 * Atomically replace the document with the given mapping.
	 * Concurrent calls are written one after another in call order.
	 *
	 * @throws PersistenceError when the document could not be replaced
	 */
	save(clients: ReadonlyMap<string, ClientRecord>): Promise<void> {
		const text = encodeTokenDocument(clients);
		return this.writeQueue(() => this.replaceFile(text));
	}

	private async replaceFile(text: string): Promise<void> {
		const directory = path.dirname(this.filePath);
		const tempPath = path.join(directory, `.${path.basename(this.filePath)}.${randomUUID()}.tmp`);

		try {
			await mkdir(directory, { recursive: true });
			const handle = await open(tempPath, 'w', 0o600);
			try {
				await handle.writeFile(text, 'utf8');
				await handle.sync();
			} finally {
				await handle.close();
			}
			await rename(tempPath, this.filePath);
		} catch (error) {
			await rm(tempPath, { force: true });
			throw new PersistenceError(this.filePath, { cause: error });
		}
	}
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
