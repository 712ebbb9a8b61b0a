export type { CreateClientCommand } from './command.js';
export {
	createCreateClientUseCase,
	DEFAULT_PROVISIONING_ATTEMPTS,
	type CreateClientUseCaseDeps,
	type CreatedClient,
} from './use-case.js';
