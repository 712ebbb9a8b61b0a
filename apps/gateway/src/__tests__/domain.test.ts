import { describe, expect, it } from 'vitest';
import { attachmentLink, composeMessageBody, generateClientToken, isWellFormedToken, keyIdOf } from '../domain/index.js';

describe('attachmentLink', () => {
	it('should escape brackets in the file name', () => {
		expect(attachmentLink('a]b[c.txt', '/user_uploads/x')).toBe('[a\\]b\\[c.txt](/user_uploads/x)');
	});
});

describe('composeMessageBody', () => {
	it('should put the link on its own line after the content', () => {
		expect(composeMessageBody('hello', 'a.txt', '/u/a.txt')).toBe('hello\n[a.txt](/u/a.txt)');
	});

	it('should use the link alone without content', () => {
		expect(composeMessageBody('', 'a.txt', '/u/a.txt')).toBe('[a.txt](/u/a.txt)');
	});
});

describe('generateClientToken', () => {
	it('should produce well-formed, distinct tokens', () => {
		const first = generateClientToken();
		const second = generateClientToken();

		expect(first).toHaveLength(43);
		expect(isWellFormedToken(first)).toBe(true);
		expect(first).not.toBe(second);
	});
});

describe('keyIdOf', () => {
	it('should give a stable 12 character fingerprint', () => {
		expect(keyIdOf('client-token')).toMatch(/^[0-9a-f]{12}$/);
		expect(keyIdOf('client-token')).toBe(keyIdOf('client-token'));
		expect(keyIdOf('client-token')).not.toBe(keyIdOf('client-token-2'));
	});
});
