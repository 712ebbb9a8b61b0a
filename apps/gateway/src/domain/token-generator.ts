/**
 * Token Generator
 *
 * Generates client credentials. Tokens are never derived from request input.
 */

import { randomBytes } from 'node:crypto';

const TOKEN_BYTES = 32;

/**
 * Produces a fresh candidate token. Injectable so collisions can be forced in tests.
 */
export type TokenGenerator = () => string;

/**
 * Generate a client token.
 * Format: 32 random bytes, base64url-encoded (43 characters).
 */
export const generateClientToken: TokenGenerator = () => randomBytes(TOKEN_BYTES).toString('base64url');
