import type { Command } from '@chat-gateway/application';
import type { PropagateMode } from '../../domain/index.js';
import type { AuthContext } from '../authorizer.js';

/**
 * Edit the content and/or rename the topic of a message in the caller's stream.
 */
export interface UpdateMessageCommand extends Command {
	readonly caller: AuthContext;
	readonly messageId: number;
	readonly propagateMode: PropagateMode;
	readonly topic?: string;
	readonly content?: string;
}
