import {
	ChatPlatformError,
	type Attachment,
	type ChatPlatform,
	type EditReceipt,
	type MessageEdit,
	type SendReceipt,
	type StreamMessage,
	type TopicSummary,
	type UploadReceipt,
} from '../../infrastructure/chat-platform.js';

/**
 * In-process chat platform. Records every write and fails on demand.
 */
export class FakeChatPlatform implements ChatPlatform {
	readonly sent: StreamMessage[] = [];
	readonly uploads: Attachment[] = [];
	readonly edits: MessageEdit[] = [];
	/** Stream name → id */
	readonly streams = new Map<string, number>();
	/** Message id → stream id, null for a direct message */
	readonly messages = new Map<number, number | null>();
	/** Stream id → topics */
	readonly topics = new Map<number, TopicSummary[]>();

	uploadFailure: ChatPlatformError | null = null;
	sendFailure: ChatPlatformError | null = null;
	closed = false;

	private nextMessageId = 100;

	async sendStreamMessage(message: StreamMessage): Promise<SendReceipt> {
		if (this.sendFailure) throw this.sendFailure;
		this.sent.push(message);
		return { result: 'success', msg: '', id: this.nextMessageId++ };
	}

	async uploadFile(file: Attachment): Promise<UploadReceipt> {
		if (this.uploadFailure) throw this.uploadFailure;
		this.uploads.push(file);
		return { result: 'success', msg: '', uri: `/user_uploads/2/ab/${file.filename}` };
	}

	async updateMessage(edit: MessageEdit): Promise<EditReceipt> {
		this.edits.push(edit);
		return { result: 'success', msg: '' };
	}

	async getMessageStreamId(messageId: number): Promise<number | null> {
		const streamId = this.messages.get(messageId);
		if (streamId === undefined) {
			throw new ChatPlatformError('Invalid message(s)', 'rejected', 'response', 400);
		}
		return streamId;
	}

	async getStreamId(stream: string): Promise<number> {
		const id = this.streams.get(stream);
		if (id === undefined) {
			throw new ChatPlatformError(`Invalid stream name '${stream}'`, 'rejected', 'response', 400);
		}
		return id;
	}

	async getStreamTopics(streamId: number): Promise<TopicSummary[]> {
		return this.topics.get(streamId) ?? [];
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}
