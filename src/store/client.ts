import type { Logger } from "pino";

import type { FetchImpl } from "../infra/timeout.js";
import { KvError } from "./errors.js";
import { silentLogger } from "./logger.js";
import {
	type ExportedEntry,
	SecretTreeNavigator,
	type TraversalOptions,
} from "./navigator.js";
import type { SecretPath } from "./path.js";
import { type PasswordSource, SessionManager } from "./session.js";
import { TokenCache } from "./token-cache.js";
import { expectOk, Transport } from "./transport.js";
import { type HealthStatus, healthStatusFromCode, type SecretRecord, type TreeEntry } from "./types.js";

export type SecretStoreClientParts = {
	transport: Transport;
	cache: TokenCache;
	session: SessionManager;
	navigator: SecretTreeNavigator;
	logger?: Logger;
};

/**
 * Everything callers do against the store, bound to one session.
 */
export class SecretStoreClient {
	readonly cache: TokenCache;
	readonly session: SessionManager;
	private readonly transport: Transport;
	private readonly navigator: SecretTreeNavigator;
	private readonly logger: Logger;

	constructor(parts: SecretStoreClientParts) {
		this.transport = parts.transport;
		this.cache = parts.cache;
		this.session = parts.session;
		this.navigator = parts.navigator;
		this.logger = parts.logger ?? silentLogger();
	}

	login(): Promise<void> {
		return this.session.ensureAuthenticated();
	}

	logout(): Promise<void> {
		return this.session.logout();
	}

	useCachedToken(): boolean {
		return this.session.useCachedToken();
	}

	lookupToken(): Promise<unknown> {
		return this.session.lookupSelf();
	}

	list(path: SecretPath, options?: TraversalOptions): Promise<TreeEntry[]> {
		return this.navigator.list(path, options);
	}

	get(path: SecretPath, options?: TraversalOptions): Promise<SecretRecord> {
		return this.navigator.get(path, options);
	}

	search(pattern: string, options?: TraversalOptions): Promise<SecretPath[]> {
		return this.navigator.search(pattern, options);
	}

	exportAll(options?: TraversalOptions): Promise<ExportedEntry[]> {
		return this.navigator.exportAll(options);
	}

	/**
	 * Seal/standby state of the server, from the status code of the health endpoint.
	 */
	async health(): Promise<HealthStatus> {
		const response = await this.transport.request("GET", "v1/sys/health", {
			authenticated: false,
		});
		const status = healthStatusFromCode(response.status);
		if (!status) {
			throw new KvError("store", `Invalid status code from health: ${response.status}`, {
				status: response.status,
			});
		}
		this.logger.debug({ status }, "health checked");
		return status;
	}

	/**
	 * Mounted secret engines, passed through as-is for display.
	 */
	async listMounts(): Promise<unknown> {
		const response = await this.transport.request("GET", "v1/sys/mounts");
		return expectOk(response, "list mounts");
	}

	close(): Promise<void> {
		return this.transport.close();
	}
}

/**
 * Everything the client needs from the configuration, resolved once at startup.
 */
export type StoreClientSettings = {
	/** Base URL with a trailing slash. */
	endpoint: string;
	username: string;
	/** PEM files, already expanded to absolute paths. */
	caCerts: readonly string[];
	tokenMaxTtlSeconds: number;
	requestTimeoutMs: number;
	/** Token cache file. */
	runtimeInfoFile: string;
	traversalConcurrency: number;
};

export type CreateClientOptions = {
	passwordSource?: PasswordSource;
	onWarning?: (message: string) => void;
	fetchImpl?: FetchImpl;
	/** Parent logger; each component logs through a child bound with its module name. */
	logger?: Logger;
};

/**
 * Build the whole stack (cache, transport, session, navigator) from resolved settings.
 */
export function createSecretStoreClient(
	settings: StoreClientSettings,
	options: CreateClientOptions = {},
): SecretStoreClient {
	const logger = options.logger ?? silentLogger();
	const cache = new TokenCache(settings.runtimeInfoFile);
	const transport = new Transport({
		endpoint: settings.endpoint,
		caCerts: settings.caCerts,
		timeoutMs: settings.requestTimeoutMs,
		fetchImpl: options.fetchImpl,
		logger: logger.child({ module: "store-transport" }),
	});
	const session = new SessionManager({
		transport,
		cache,
		username: settings.username,
		tokenMaxTtlSeconds: settings.tokenMaxTtlSeconds,
		passwordSource: options.passwordSource,
		onWarning: options.onWarning,
		logger: logger.child({ module: "session" }),
	});
	const navigator = new SecretTreeNavigator({
		transport,
		username: settings.username,
		concurrency: settings.traversalConcurrency,
		logger: logger.child({ module: "navigator" }),
	});
	return new SecretStoreClient({
		transport,
		cache,
		session,
		navigator,
		logger: logger.child({ module: "store-client" }),
	});
}
