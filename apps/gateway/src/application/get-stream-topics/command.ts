import type { Command } from '@chat-gateway/application';
import type { AuthContext } from '../authorizer.js';

export interface GetStreamTopicsCommand extends Command {
	readonly caller: AuthContext;
}
