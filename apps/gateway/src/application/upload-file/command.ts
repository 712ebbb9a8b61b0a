import type { Command } from '@chat-gateway/application';
import type { Attachment } from '../../infrastructure/chat-platform.js';
import type { AuthContext } from '../authorizer.js';

export interface UploadFileCommand extends Command {
	readonly caller: AuthContext;
	readonly file: Attachment;
}
