/**
 * Relay Transaction
 *
 * Two-phase forward of one message: upload the attachment (if any), then send
 * the composed message. The state is explicit so a file that was stored but
 * never linked from a message (`uploaded-not-sent`) can be reported.
 *
 * pending ─▶ uploaded-not-sent ─▶ sent
 *    │              │
 *    ▼              ▼
 * upload-failed   send-failed
 */

import { Result, UseCaseError } from '@chat-gateway/domain-core';
import { composeMessageBody } from '../../domain/index.js';
import type { Attachment, ChatPlatform, SendReceipt, UploadReceipt } from '../../infrastructure/chat-platform.js';
import { callPlatform, deliveryStateOf } from '../upstream-errors.js';

export type RelayState =
	| { readonly phase: 'pending' }
	| { readonly phase: 'uploaded-not-sent'; readonly upload: UploadReceipt }
	| { readonly phase: 'sent'; readonly receipt: SendReceipt; readonly upload: UploadReceipt | null }
	| { readonly phase: 'upload-failed'; readonly error: UseCaseError }
	| { readonly phase: 'send-failed'; readonly error: UseCaseError; readonly upload: UploadReceipt | null };

export type RelayPhase = RelayState['phase'];

export interface RelayRequest {
	readonly stream: string;
	readonly topic: string;
	readonly content: string;
	readonly attachment?: Attachment;
}

export class RelayTransaction {
	private current: RelayState = { phase: 'pending' };

	constructor(
		private readonly platform: ChatPlatform,
		private readonly relay: RelayRequest,
	) {}

	get state(): RelayState {
		return this.current;
	}

	/**
	 * Run both phases. A transaction runs once.
	 */
	async run(): Promise<Result<SendReceipt>> {
		if (this.current.phase !== 'pending') {
			throw new Error(`Relay transaction already ran (state: ${this.current.phase})`);
		}

		let upload: UploadReceipt | null = null;
		let body = this.relay.content;

		const { attachment } = this.relay;
		if (attachment) {
			const uploaded = await callPlatform(
				() => this.platform.uploadFile(attachment),
				(error) => ({ delivery: 'not_sent', reason: error.failure }),
			);
			if (!uploaded.ok) {
				const error = UseCaseError.upstream(
					'ATTACHMENT_UPLOAD_FAILED',
					`Attachment upload failed: ${uploaded.cause.message}`,
					uploaded.error.details,
				);
				this.current = { phase: 'upload-failed', error };
				return Result.failure(error);
			}

			upload = uploaded.value;
			this.current = { phase: 'uploaded-not-sent', upload };
			body = composeMessageBody(this.relay.content, attachment.filename, upload.uri);
		}

		const sent = await callPlatform(
			() => this.platform.sendStreamMessage({ stream: this.relay.stream, topic: this.relay.topic, content: body }),
			(error) => ({ delivery: deliveryStateOf(error), ...(upload ? { uploadedUri: upload.uri } : {}) }),
		);
		if (!sent.ok) {
			this.current = { phase: 'send-failed', error: sent.error, upload };
			return Result.failure(sent.error);
		}

		this.current = { phase: 'sent', receipt: sent.value, upload };
		return Result.success(sent.value);
	}
}
