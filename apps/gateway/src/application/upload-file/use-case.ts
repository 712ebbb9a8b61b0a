/**
 * Upload File Use Case
 *
 * Regular clients only. Stores a file on the chat platform and returns its
 * URI, for clients that link uploads from later messages themselves.
 */

import type { UseCase } from '@chat-gateway/application';
import { Result, UseCaseError, ExecutionContext } from '@chat-gateway/application';
import type { Logger } from '@chat-gateway/logging';
import type { ChatPlatform, UploadReceipt } from '../../infrastructure/chat-platform.js';
import { requireRole } from '../authorizer.js';
import { callPlatform } from '../upstream-errors.js';
import type { UploadFileCommand } from './command.js';

export interface UploadFileUseCaseDeps {
	readonly platform: ChatPlatform;
	readonly logger: Logger;
}

export function createUploadFileUseCase(deps: UploadFileUseCaseDeps): UseCase<UploadFileCommand, UploadReceipt> {
	const { platform } = deps;
	const logger = deps.logger.child({ component: 'UploadFile' });

	return {
		async execute(command: UploadFileCommand, context: ExecutionContext): Promise<Result<UploadReceipt>> {
			const access = requireRole(command.caller, 'regular');
			if (Result.isFailure(access)) {
				return access;
			}

			if (command.file.data.length === 0) {
				return Result.failure(UseCaseError.validation('FILE_EMPTY', 'file must not be empty', { field: 'file' }));
			}

			const uploaded = await callPlatform(
				() => platform.uploadFile(command.file),
				(error) => ({ reason: error.failure }),
			);
			if (!uploaded.ok) {
				logger.warn(
					{ correlationId: context.correlationId, keyId: access.value.keyId, code: uploaded.error.code },
					'File upload failed',
				);
				return Result.failure(
					UseCaseError.upstream(
						'ATTACHMENT_UPLOAD_FAILED',
						`Attachment upload failed: ${uploaded.cause.message}`,
						uploaded.error.details,
					),
				);
			}

			logger.info(
				{ correlationId: context.correlationId, keyId: access.value.keyId, bytes: command.file.data.length },
				'File uploaded',
			);
			return Result.success(uploaded.value);
		},
	};
}
