/**
 * Secret store client
 *
 * Narrow client for one Vault KV API shape: a session manager that reuses or
 * renews a bearer token, and a navigator that walks the secret tree
 * breadth-first to search or export it.
 */

// Client
export {
	type CreateClientOptions,
	createSecretStoreClient,
	SecretStoreClient,
	type StoreClientSettings,
} from "./client.js";
// Errors
export { isKvError, KvError, type KvErrorKind } from "./errors.js";
// Navigation
export { type ExportedEntry, SecretTreeNavigator, type TraversalOptions } from "./navigator.js";
export { PATH_SEPARATOR, SecretPath } from "./path.js";
// Session
export { normalizeUsername, type PasswordSource, SessionManager } from "./session.js";
export { CACHE_KEYS, TokenCache } from "./token-cache.js";
export { expectOk, Transport } from "./transport.js";
// Data model
export {
	type HealthStatus,
	PASSWORD_FIELD,
	type SecretRecord,
	type TreeEntry,
} from "./types.js";
