/**
 * Chat platform naming constraints shared by provisioning and relay.
 */

export const MAX_STREAM_NAME_LENGTH = 60;
export const MAX_TOPIC_LENGTH = 60;
export const MAX_MESSAGE_LENGTH = 10_000;

/** Largest proposal number accepted on provisioning. */
export const MAX_PROPOSAL_NO = 2_147_483_647;

export const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

/** Which messages of a topic a topic rename applies to. */
export type PropagateMode = 'change_one' | 'change_all' | 'change_later';

/**
 * Markdown link to an uploaded file. Brackets in the label are escaped so
 * the link cannot be broken by a crafted filename.
 */
export function attachmentLink(filename: string, uri: string): string {
	const label = filename.replace(/[[\]\\]/g, (ch) => `\\${ch}`);
	return `[${label}](${uri})`;
}

/**
 * Message body for a post with an attachment: the supplied content followed
 * by a link to the upload, or the link alone when there is no content.
 */
export function composeMessageBody(content: string, filename: string, uri: string): string {
	const link = attachmentLink(filename, uri);
	return content.length > 0 ? `${content}\n${link}` : link;
}
