/**
 * Chat Platform
 *
 * The outbound seam to the chat service. The gateway only ever writes to it;
 * no call returns message content to a client.
 */

import type { PropagateMode } from '../domain/index.js';

export interface StreamMessage {
	readonly stream: string;
	readonly topic: string;
	readonly content: string;
}

export interface Attachment {
	readonly filename: string;
	readonly contentType: string;
	readonly data: Buffer;
}

export interface SendReceipt {
	readonly result: string;
	readonly msg: string;
	readonly id: number;
}

export interface UploadReceipt {
	readonly result: string;
	readonly msg: string;
	readonly uri: string;
}

export interface MessageEdit {
	readonly messageId: number;
	readonly propagateMode: PropagateMode;
	readonly topic?: string;
	readonly content?: string;
}

export interface EditReceipt {
	readonly result: string;
	readonly msg: string;
}

export interface TopicSummary {
	readonly name: string;
	readonly max_id: number;
}

export interface ChatPlatform {
	sendStreamMessage(message: StreamMessage): Promise<SendReceipt>;
	uploadFile(file: Attachment): Promise<UploadReceipt>;
	updateMessage(edit: MessageEdit): Promise<EditReceipt>;
	/** Stream a message was posted to, or null for a direct message. */
	getMessageStreamId(messageId: number): Promise<number | null>;
	getStreamId(stream: string): Promise<number>;
	getStreamTopics(streamId: number): Promise<TopicSummary[]>;
	close(): Promise<void>;
}

/**
 * How an upstream call failed:
 * - `unavailable`: the platform could not be reached or answered 5xx
 * - `rejected`: the platform answered with a client error
 * - `timeout`: no answer within the deadline
 * - `malformed`: the platform accepted the request but its answer could not be read
 */
export type ChatPlatformFailure = 'unavailable' | 'rejected' | 'timeout' | 'malformed';

/**
 * Whether the request may have reached the platform before failing.
 * `connect` failures never did.
 */
export type ChatPlatformFailurePhase = 'connect' | 'response';

export class ChatPlatformError extends Error {
	constructor(
		message: string,
		readonly failure: ChatPlatformFailure,
		readonly phase: ChatPlatformFailurePhase,
		readonly status?: number,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = 'ChatPlatformError';
	}

	/** True when the platform may have acted on the request. */
	get mayHaveReachedPlatform(): boolean {
		return this.failure !== 'rejected' && this.phase === 'response';
	}
}
