import { mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ClientRecord } from '../domain/index.js';
import {
	decodeTokenDocument,
	encodeTokenDocument,
	JsonFileTokenStore,
	PersistenceError,
	StoreCorruptError,
} from '../infrastructure/token-store.js';

describe('JsonFileTokenStore', () => {
	let dir: string;
	let filePath: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), 'token-store-'));
		filePath = path.join(dir, 'clients.json');
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('should load an empty registry when the document is absent', async () => {
		const clients = await new JsonFileTokenStore(filePath).load();

		expect(clients.size).toBe(0);
	});

	it('should round-trip admin and regular records', async () => {
		const store = new JsonFileTokenStore(filePath);
		const clients = new Map<string, ClientRecord>([
			['admin-token', ClientRecord.admin('admin-token')],
			['regular-token', ClientRecord.regular('regular-token', 2222, 'proposal 2222 stream')],
		]);

		await store.save(clients);
		const loaded = await new JsonFileTokenStore(filePath).load();

		expect(loaded).toEqual(clients);
		expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual({
			'admin-token': { admin: true },
			'regular-token': { proposal_no: 2222, stream: 'proposal 2222 stream' },
		});
	});

	it('should create the parent directory on first save', async () => {
		const nested = path.join(dir, 'config', 'clients.json');

		await new JsonFileTokenStore(nested).save(new Map([['t1', ClientRecord.admin('t1')]]));

		expect(await readFile(nested, 'utf8')).toBe('{\n  "t1": {\n    "admin": true\n  }\n}\n');
	});

	it('should write the document readable by its owner only', async () => {
		await new JsonFileTokenStore(filePath).save(new Map([['t1', ClientRecord.admin('t1')]]));

		const { mode } = await stat(filePath);
		expect(mode & 0o777).toBe(0o600);
	});

	it('should keep the last of several concurrent saves', async () => {
		const store = new JsonFileTokenStore(filePath);
		const first = new Map([['t1', ClientRecord.admin('t1')]]);
		const second = new Map<string, ClientRecord>([
			['t1', ClientRecord.admin('t1')],
			['t2', ClientRecord.regular('t2', 7, 'seven')],
		]);

		await Promise.all([store.save(first), store.save(second)]);

		expect(await store.load()).toEqual(second);
	});

	it('should refuse a document that is not JSON and leave it untouched', async () => {
		await writeFile(filePath, '{"t1": {"admin": tru');

		const error = await new JsonFileTokenStore(filePath).load().catch((e: unknown) => e);

		expect(error).toBeInstanceOf(StoreCorruptError);
		expect(error).toHaveProperty('reason', 'not valid JSON');
		expect(await readFile(filePath, 'utf8')).toBe('{"t1": {"admin": tru');
	});

	it('should fail the save and leave no temporary file when the target cannot be replaced', async () => {
		await mkdir(filePath);

		const error = await new JsonFileTokenStore(filePath)
			.save(new Map([['t1', ClientRecord.admin('t1')]]))
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(PersistenceError);
		expect(await readdir(dir)).toEqual(['clients.json']);
	});
});

describe('decodeTokenDocument', () => {
	it.each([
		['a wrongly typed proposal number', '{"t1": {"proposal_no": "2222", "stream": "s"}}'],
		['a non-positive proposal number', '{"t1": {"proposal_no": 0, "stream": "s"}}'],
		['an empty stream', '{"t1": {"proposal_no": 1, "stream": ""}}'],
		['an admin flag set to false', '{"t1": {"admin": false}}'],
		['an unknown field', '{"t1": {"admin": true, "scope": "all"}}'],
		['a record with both shapes', '{"t1": {"admin": true, "proposal_no": 1, "stream": "s"}}'],
		['a token outside the token alphabet', '{"t 1": {"admin": true}}'],
		['a scalar document', '42'],
	])('should reject %s', (_label, text) => {
		expect(() => decodeTokenDocument('clients.json', text)).toThrow(StoreCorruptError);
	});

	it('should name the file in the error', () => {
		expect(() => decodeTokenDocument('/srv/clients.json', 'nope')).toThrow(
			'Client document /srv/clients.json is corrupt: not valid JSON',
		);
	});

	it('should accept an empty document', () => {
		expect(decodeTokenDocument('clients.json', '{}').size).toBe(0);
	});
});

describe('encodeTokenDocument', () => {
	it('should write records in registry order', () => {
		const text = encodeTokenDocument(
			new Map<string, ClientRecord>([
				['b', ClientRecord.regular('b', 1, 'one')],
				['a', ClientRecord.admin('a')],
			]),
		);

		expect(Object.keys(JSON.parse(text))).toEqual(['b', 'a']);
		expect(text.endsWith('}\n')).toBe(true);
	});
});
