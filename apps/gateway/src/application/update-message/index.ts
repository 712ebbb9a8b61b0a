export type { UpdateMessageCommand } from './command.js';
export { createUpdateMessageUseCase, type UpdateMessageUseCaseDeps } from './use-case.js';
