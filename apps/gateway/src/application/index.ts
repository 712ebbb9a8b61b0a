export {
	createAuthorizer,
	requireRole,
	type Authorizer,
	type AuthContext,
	type AdminContext,
	type RegularContext,
	type ContextFor,
} from './authorizer.js';
export { bootstrapAdmin, type BootstrapOutcome, type BootstrapAdminOptions } from './bootstrap-admin.js';
export { toUpstreamError, deliveryStateOf, callPlatform, type DeliveryState } from './upstream-errors.js';
export * from './create-client/index.js';
export * from './send-message/index.js';
export * from './upload-file/index.js';
export * from './update-message/index.js';
export * from './get-stream-topics/index.js';
