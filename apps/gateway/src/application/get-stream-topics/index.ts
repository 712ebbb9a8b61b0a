export type { GetStreamTopicsCommand } from './command.js';
export { createGetStreamTopicsUseCase, type GetStreamTopicsUseCaseDeps, type StreamTopics } from './use-case.js';
