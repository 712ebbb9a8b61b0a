import type { Command } from '@chat-gateway/application';
import type { Attachment } from '../../infrastructure/chat-platform.js';
import type { AuthContext } from '../authorizer.js';

/**
 * Post a message to the caller's stream. There is deliberately no stream
 * field: the target is always the stream bound to the caller's token.
 */
export interface SendMessageCommand extends Command {
	readonly caller: AuthContext;
	readonly topic: string;
	readonly content: string;
	readonly attachment?: Attachment;
}
