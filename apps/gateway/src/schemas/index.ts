import { CommonSchemas, Type, type Static } from '@chat-gateway/http';

export const CreateClientBodySchema = Type.Object({
	proposal_no: Type.Number({ description: 'Proposal the client posts for' }),
	stream: Type.String({ description: 'Stream the client is bound to' }),
});
export type CreateClientBody = Static<typeof CreateClientBodySchema>;

export const CreatedClientResponseSchema = Type.Object({
	token: Type.String({ description: 'Client credential; shown only once' }),
	proposal_no: Type.Integer(),
	stream: Type.String(),
});

export const TopicQuerySchema = Type.Object({
	topic: Type.Optional(Type.String({ description: 'Topic within the caller stream' })),
});
export type TopicQuery = Static<typeof TopicQuerySchema>;

/** JSON body of send_message; multipart bodies carry the same field as a form field. */
export const SendMessageJsonBodySchema = Type.Object({
	content: Type.Optional(Type.String()),
});

export const SendReceiptSchema = Type.Object({
	result: Type.String(),
	msg: Type.String(),
	id: Type.Integer(),
});

export const UploadReceiptSchema = Type.Object({
	result: Type.String(),
	msg: Type.String(),
	uri: Type.String(),
});

export const UpdateMessageQuerySchema = Type.Object({
	message_id: CommonSchemas.MessageId,
	propagate_mode: Type.Union([Type.Literal('change_one'), Type.Literal('change_all'), Type.Literal('change_later')], {
		default: 'change_one',
	}),
	topic: Type.Optional(Type.String()),
});
export type UpdateMessageQuery = Static<typeof UpdateMessageQuerySchema>;

export const UpdateMessageJsonBodySchema = Type.Object({
	content: Type.Optional(Type.String()),
});

export const EditReceiptSchema = Type.Object({
	result: Type.String(),
	msg: Type.String(),
});

export const StreamTopicsResponseSchema = Type.Object({
	stream: Type.String(),
	topics: Type.Array(
		Type.Object({
			name: Type.String(),
			max_id: Type.Integer(),
		}),
	),
});

export const MeResponseSchema = Type.Object({
	role: Type.Union([Type.Literal('admin'), Type.Literal('regular')]),
	key_id: Type.String(),
	proposal_no: Type.Optional(Type.Integer()),
	stream: Type.Optional(Type.String()),
});

export const HealthResponseSchema = Type.Object({
	status: Type.Literal('OK'),
	version: Type.String(),
	uptime_seconds: Type.Number(),
});
