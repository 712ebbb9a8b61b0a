export type { UploadFileCommand } from './command.js';
export { createUploadFileUseCase, type UploadFileUseCaseDeps } from './use-case.js';
