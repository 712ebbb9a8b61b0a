export type { SendMessageCommand } from './command.js';
export { createSendMessageUseCase, type SendMessageUseCaseDeps } from './use-case.js';
export { RelayTransaction, type RelayState, type RelayPhase, type RelayRequest } from './relay-transaction.js';
