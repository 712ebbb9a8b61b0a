/**
 * Multipart form reading for the upload routes. Every part is consumed
 * before the form is returned, so handlers can reject a form without
 * leaving the request stream half read.
 */

import type { FastifyRequest } from 'fastify';
import type { Attachment } from '../infrastructure/chat-platform.js';

export interface MultipartForm {
	readonly fields: ReadonlyMap<string, string>;
	readonly files: ReadonlyMap<string, Attachment>;
}

const DEFAULT_FILENAME = 'upload';

export async function readMultipartForm(request: FastifyRequest): Promise<MultipartForm> {
	const fields = new Map<string, string>();
	const files = new Map<string, Attachment>();

	for await (const part of request.parts()) {
		if (part.type === 'file') {
			const data = await part.toBuffer();
			files.set(part.fieldname, {
				filename: part.filename || DEFAULT_FILENAME,
				contentType: part.mimetype || 'application/octet-stream',
				data,
			});
		} else {
			fields.set(part.fieldname, typeof part.value === 'string' ? part.value : String(part.value));
		}
	}

	return { fields, files };
}

/**
 * The first attachment found under one of the accepted field names.
 */
export function pickFile(form: MultipartForm, fieldNames: readonly string[]): Attachment | undefined {
	for (const name of fieldNames) {
		const file = form.files.get(name);
		if (file) return file;
	}
	return undefined;
}

/**
 * File fields outside the accepted names.
 */
export function unexpectedFiles(form: MultipartForm, fieldNames: readonly string[]): string[] {
	return [...form.files.keys()].filter((name) => !fieldNames.includes(name));
}
