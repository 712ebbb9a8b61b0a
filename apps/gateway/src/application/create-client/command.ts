import type { Command } from '@chat-gateway/application';
import type { AuthContext } from '../authorizer.js';

/**
 * Provision a regular client bound to one stream.
 */
export interface CreateClientCommand extends Command {
	readonly caller: AuthContext;
	readonly proposalNo: number;
	readonly stream: string;
}
