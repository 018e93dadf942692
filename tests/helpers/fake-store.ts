/**
 * In-process stand-in for the secret store HTTP API, plugged into the
 * transport through `fetchImpl`.
 */

import type { FetchImpl } from "../../src/infra/timeout.js";
import type { SecretRecord } from "../../src/store/index.js";

export type RecordedCall = {
	method: string;
	path: string;
	token: string | null;
	body: unknown;
};

export type FakeStoreOptions = {
	username?: string;
	password?: string;
	/** Leaf path (`a/b`) → record. */
	entries?: Record<string, SecretRecord>;
	validTokens?: string[];
};

function json(payload: unknown, status = 200): Response {
	return new Response(JSON.stringify(payload), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

const METADATA_PREFIX = "/v1/passwords/metadata/";
const DATA_PREFIX = "/v1/passwords/data/";
const LOGIN_PREFIX = "/v1/auth/userpass/login/";

export class FakeSecretStore {
	readonly calls: RecordedCall[] = [];
	readonly validTokens: Set<string>;
	readonly entries: Record<string, SecretRecord>;
	readonly username: string;
	readonly password: string;
	healthCode = 200;
	private issued = 0;

	constructor(options: FakeStoreOptions = {}) {
		this.username = options.username ?? "alice";
		this.password = options.password ?? "test-password";
		this.entries = options.entries ?? {};
		this.validTokens = new Set(options.validTokens ?? []);
	}

	readonly fetch: FetchImpl = async (url, init) => this.handle(url, init);

	callsTo(method: string, pathPrefix: string): RecordedCall[] {
		return this.calls.filter((call) => call.method === method && call.path.startsWith(pathPrefix));
	}

	private handle(url: string, init: RequestInit): Response {
		const { pathname } = new URL(url);
		const method = init.method ?? "GET";
		const auth = new Headers(init.headers).get("Authorization");
		const token = auth?.startsWith("Bearer ") ? auth.slice("Bearer ".length) : null;
		const body: unknown = typeof init.body === "string" ? JSON.parse(init.body) : undefined;
		this.calls.push({ method, path: pathname, token, body });

		const authorized = token !== null && this.validTokens.has(token);

		if (method === "POST" && pathname.startsWith(LOGIN_PREFIX)) {
			return this.login(decodeURIComponent(pathname.slice(LOGIN_PREFIX.length)), body);
		}
		if (method === "GET" && pathname === "/v1/auth/token/lookup-self") {
			return authorized
				? json({ data: { id: token, policies: ["default"], ttl: 3600 } })
				: json({ errors: ["permission denied"] }, 403);
		}
		if (method === "POST" && pathname === "/v1/auth/token/revoke-self") {
			if (!authorized || token === null) return json({ errors: ["permission denied"] }, 403);
			this.validTokens.delete(token);
			return new Response(null, { status: 204 });
		}
		if (method === "GET" && pathname === "/v1/sys/health") {
			return json({ initialized: true, sealed: this.healthCode === 503 }, this.healthCode);
		}
		if (method === "GET" && pathname === "/v1/sys/mounts") {
			return authorized
				? json({ "passwords/": { type: "kv", options: { version: "2" } } })
				: json({ errors: ["permission denied"] }, 403);
		}
		if (method === "LIST" && pathname.startsWith(METADATA_PREFIX)) {
			if (!authorized) return json({ errors: ["permission denied"] }, 403);
			return this.list(pathname.slice(METADATA_PREFIX.length));
		}
		if (method === "GET" && pathname.startsWith(DATA_PREFIX)) {
			if (!authorized) return json({ errors: ["permission denied"] }, 403);
			return this.read(pathname.slice(DATA_PREFIX.length));
		}
		return json({ errors: [] }, 404);
	}

	private login(username: string, body: unknown): Response {
		const password =
			typeof body === "object" && body !== null && "password" in body ? body.password : undefined;
		if (username !== this.username || password !== this.password) {
			return json({ errors: ["invalid username or password"] }, 400);
		}
		this.issued += 1;
		const token = `test-token-${this.issued}`;
		this.validTokens.add(token);
		return json({ auth: { client_token: token, lease_duration: 86400 } });
	}

	private splitUserPath(rest: string): { user: string; path: string } {
		const [user = "", ...segments] = rest.split("/");
		return {
			user: decodeURIComponent(user),
			path: segments.filter(Boolean).map(decodeURIComponent).join("/"),
		};
	}

	private list(rest: string): Response {
		const { user, path } = this.splitUserPath(rest);
		if (user !== this.username) return json({ errors: ["permission denied"] }, 403);

		const prefix = path === "" ? "" : `${path}/`;
		const children = new Set<string>();
		for (const entryPath of Object.keys(this.entries)) {
			if (!entryPath.startsWith(prefix)) continue;
			const [head, ...tail] = entryPath.slice(prefix.length).split("/");
			children.add(tail.length > 0 ? `${head}/` : head);
		}
		if (children.size === 0) return json({ errors: [] }, 404);
		return json({ request_id: "req-1", data: { keys: [...children].sort() } });
	}

	private read(rest: string): Response {
		const { user, path } = this.splitUserPath(rest);
		if (user !== this.username) return json({ errors: ["permission denied"] }, 403);
		const record = this.entries[path];
		if (!record) return json({ errors: [] }, 404);
		return json({ data: { data: record, metadata: { version: 1 } } });
	}
}
