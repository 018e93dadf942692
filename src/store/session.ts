/**
 * Session manager: owns the one token a process uses.
 *
 * Bootstrap order:
 * 1. token from the runtime info file (absent or unreadable → step 3)
 * 2. validate it with lookup-self; any non-error answer is accepted
 * 3. interactive password login, token persisted before returning
 */

import type { Logger } from "pino";

import { formatErrorSafe } from "../infra/network-errors.js";
import { firstErrorMessage, KvError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { CACHE_KEYS, type TokenCache } from "./token-cache.js";
import { expectOk, type Transport } from "./transport.js";
import { LoginResponseSchema, type SessionState } from "./types.js";

/** Asks the user for a password. */
export type PasswordSource = () => Promise<string>;

export type SessionManagerOptions = {
	transport: Transport;
	cache: TokenCache;
	username: string;
	tokenMaxTtlSeconds?: number;
	/** Absent when the process has no way to ask (non-interactive run). */
	passwordSource?: PasswordSource;
	/** User-facing warnings, e.g. an already revoked token on logout. */
	onWarning?: (message: string) => void;
	logger?: Logger;
};

const DEFAULT_TOKEN_MAX_TTL_SECONDS = 24 * 60 * 60;

/**
 * The auth backend case-folds usernames but storage paths are case-sensitive,
 * so every request uses the lower-cased form.
 */
export function normalizeUsername(username: string): string {
	return username.toLowerCase();
}

export class SessionManager {
	readonly username: string;
	private readonly transport: Transport;
	private readonly cache: TokenCache;
	private readonly tokenMaxTtlSeconds: number;
	private readonly passwordSource: PasswordSource | undefined;
	private readonly onWarning: (message: string) => void;
	private readonly logger: Logger;
	private state: SessionState = { status: "unauthenticated" };

	constructor(options: SessionManagerOptions) {
		this.username = normalizeUsername(options.username);
		this.transport = options.transport;
		this.cache = options.cache;
		this.tokenMaxTtlSeconds = options.tokenMaxTtlSeconds ?? DEFAULT_TOKEN_MAX_TTL_SECONDS;
		this.passwordSource = options.passwordSource;
		this.logger = options.logger ?? silentLogger();
		this.onWarning = options.onWarning ?? (() => {});

		this.transport.bindToken(() => this.token);
	}

	get token(): string | null {
		return this.state.status === "authenticated" ? this.state.token : null;
	}

	get sessionState(): SessionState {
		return this.state;
	}

	/**
	 * Adopt the cached token without checking it with the server.
	 * Returns whether a token was found.
	 */
	useCachedToken(): boolean {
		const token = this.cache.get(CACHE_KEYS.TOKEN);
		if (!token) return false;
		this.state = { status: "authenticated", token, validated: false };
		return true;
	}

	/**
	 * Make sure the session holds a token the server accepts, prompting for a
	 * password only when the cached one is missing or rejected.
	 */
	async ensureAuthenticated(): Promise<void> {
		if (this.state.status === "authenticated" && this.state.validated) return;

		const candidate =
			this.state.status === "authenticated" ? this.state.token : this.readCachedToken();
		if (candidate && (await this.validate(candidate))) {
			return;
		}

		await this.loginInteractive();
	}

	/**
	 * Exchange username and password for a new token and cache it.
	 */
	async loginWithPassword(password: string): Promise<void> {
		const response = await this.transport.request(
			"POST",
			`v1/auth/userpass/login/${encodeURIComponent(this.username)}`,
			{
				body: { password, token_max_ttl: this.tokenMaxTtlSeconds },
				authenticated: false,
			},
		);

		const message = firstErrorMessage(response.body);
		if (message !== null) {
			throw new KvError("auth-rejected", `Failed to login: ${message}`, {
				status: response.status,
			});
		}
		if (!response.ok) {
			throw new KvError("auth-rejected", `Failed to login: HTTP ${response.status}`, {
				status: response.status,
			});
		}

		const parsed = LoginResponseSchema.safeParse(response.body);
		if (!parsed.success) {
			throw new KvError("malformed-response", "Login response carries no client token", {
				status: response.status,
			});
		}

		const token = parsed.data.auth.client_token;
		this.state = { status: "authenticated", token, validated: true };
		this.cache.set(CACHE_KEYS.TOKEN, token);
		this.logger.info({ username: this.username }, "logged in with password");
	}

	/**
	 * Raw token self-lookup. Any answer without an `errors` entry counts as valid.
	 */
	async lookupSelf(): Promise<unknown> {
		const response = await this.transport.request("GET", "v1/auth/token/lookup-self");
		const body = expectOk(response, "lookup token");
		if (body === null) {
			throw new KvError("malformed-response", "Token lookup returned an empty body", {
				status: response.status,
			});
		}
		return body;
	}

	/**
	 * Revoke the token server-side and forget it locally.
	 * A 403 means the token is already invalid; the end state is the same.
	 */
	async logout(): Promise<void> {
		if (this.state.status === "unauthenticated") return;

		const response = await this.transport.request("POST", "v1/auth/token/revoke-self");
		if (response.status === 403) {
			this.logger.warn("token already invalid on logout");
			this.onWarning("Invalid token. Maybe it has expired. Clearing token cache...");
		} else {
			expectOk(response, "logout");
		}

		this.state = { status: "unauthenticated" };
		this.cache.set(CACHE_KEYS.TOKEN, null);
		this.logger.info("logged out");
	}

	private readCachedToken(): string | null {
		try {
			return this.cache.get(CACHE_KEYS.TOKEN);
		} catch (err) {
			this.logger.warn(
				{ error: formatErrorSafe(err) },
				"token cache unreadable; falling back to password login",
			);
			return null;
		}
	}

	private async validate(token: string): Promise<boolean> {
		this.state = { status: "authenticated", token, validated: false };
		try {
			await this.lookupSelf();
		} catch (err) {
			this.logger.debug({ error: formatErrorSafe(err) }, "cached token rejected");
			this.state = { status: "unauthenticated" };
			return false;
		}
		this.state = { status: "authenticated", token, validated: true };
		this.logger.debug("cached token accepted");
		return true;
	}

	private async loginInteractive(): Promise<void> {
		if (!this.passwordSource) {
			throw new KvError(
				"no-credential-source",
				"No valid cached token and no interactive input to ask for a password",
			);
		}
		const password = await this.passwordSource();
		await this.loginWithPassword(password);
	}
}
