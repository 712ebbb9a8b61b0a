/**
 * Command Types
 *
 * Commands represent the input to gateway operations. They are plain,
 * immutable data objects carrying the intent and data for a use case.
 *
 * Conventions:
 * - Commands are named in imperative form: CreateClient, SendMessage
 * - Commands are immutable (readonly properties)
 * - Commands do not contain validation logic (validation is in use cases)
 *
 * @example
 * ```typescript
 * interface SendMessageCommand extends Command {
 *     readonly topic: string;
 *     readonly content: string;
 * }
 * ```
 */

/**
 * Base marker interface for commands.
 */
export interface Command {
	/**
	 * Optional operation type identifier, used as the operation name in logs.
	 */
	readonly _type?: string;
}

/**
 * Create a command with an explicit type identifier.
 *
 * @example
 * ```typescript
 * const command = createCommand('SendMessage', { topic: 'status', content: 'hi' });
 * // command._type === 'SendMessage'
 * ```
 */
export function createCommand<T extends Record<string, unknown>>(type: string, data: T): Command & T {
	return { _type: type, ...data };
}

