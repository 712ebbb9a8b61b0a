import { describe, it, expect } from 'vitest';
import { safeValidate, ErrorResponseSchema, Type } from '../schemas.js';

describe('safeValidate', () => {
	it('should return typed data for a valid value', () => {
		const result = safeValidate({ code: 'X', message: 'y' }, ErrorResponseSchema);

		expect(result).toEqual({ success: true, data: { code: 'X', message: 'y' } });
	});

	it('should describe each failing path', () => {
		const schema = Type.Object({ topic: Type.String({ maxLength: 3 }) });
		const result = safeValidate({ topic: 'toolong' }, schema);

		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error).toContain('/topic');
		}
	});
});
