export {
	ClientRecord,
	type ClientRole,
	type AdminClient,
	type RegularClient,
	TOKEN_PATTERN,
	MAX_TOKEN_LENGTH,
	isWellFormedToken,
	keyIdOf,
} from './client-record.js';
export { generateClientToken, type TokenGenerator } from './token-generator.js';
export {
	MAX_STREAM_NAME_LENGTH,
	MAX_TOPIC_LENGTH,
	MAX_MESSAGE_LENGTH,
	MAX_PROPOSAL_NO,
	CONTROL_CHARACTERS,
	type PropagateMode,
	attachmentLink,
	composeMessageBody,
} from './naming.js';
