import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import pino from "pino";

import {
	CACHE_KEYS,
	createSecretStoreClient,
	SecretPath,
	type StoreClientSettings,
} from "../../src/store/index.js";
import { FakeSecretStore } from "../helpers/fake-store.js";

describe("SecretStoreClient", () => {
	let dir: string;
	let store: FakeSecretStore;
	let settings: StoreClientSettings;

	beforeEach(() => {
		dir = mkdtempSync(join(os.tmpdir(), "kvhunt-client-"));
		store = new FakeSecretStore({
			entries: { "a/b": { Password: "test-secret", Url: "https://example.test" }, c: { Password: "y" } },
		});
		settings = {
			endpoint: "https://vault.test:8200/",
			username: "alice",
			caCerts: [],
			tokenMaxTtlSeconds: 86_400,
			requestTimeoutMs: 30_000,
			runtimeInfoFile: join(dir, "runtime.json"),
			traversalConcurrency: 1,
		};
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	function createClient() {
		return createSecretStoreClient(settings, {
			fetchImpl: store.fetch,
			passwordSource: async () => "test-password",
		});
	}

	it("logs in, searches and reads through one session", async () => {
		const client = createClient();

		await client.login();
		const matches = await client.search("b");
		const record = await client.get(SecretPath.parse("a/b"));

		expect(matches.map(String)).toEqual(["a/b"]);
		expect(record).toEqual({ Password: "test-secret", Url: "https://example.test" });
		expect(client.cache.get(CACHE_KEYS.TOKEN)).toBe("test-token-1");
		expect(store.calls[0]?.path).toBe("/v1/auth/userpass/login/alice");
	});

	it("reuses the cached token in a second client", async () => {
		await createClient().login();
		const second = createClient();

		await second.login();
		const all = await second.exportAll();

		expect(store.callsTo("POST", "/v1/auth/userpass/login/")).toHaveLength(1);
		expect(all.map((entry) => entry.path.toString())).toEqual(["c", "a/b"]);
	});

	it("logs through the injected logger with one child per component", async () => {
		const lines: string[] = [];
		const client = createSecretStoreClient(settings, {
			fetchImpl: store.fetch,
			passwordSource: async () => "test-password",
			logger: pino({ level: "debug" }, { write: (line: string) => lines.push(line) }),
		});

		await client.login();
		await client.health();

		const records: unknown[] = lines.map((line) => JSON.parse(line));
		expect(records).toContainEqual(
			expect.objectContaining({ module: "session", msg: "logged in with password", username: "alice" }),
		);
		expect(records).toContainEqual(
			expect.objectContaining({ module: "store-client", msg: "health checked", status: "active" }),
		);
		expect(records).toContainEqual(
			expect.objectContaining({ module: "store-transport", msg: "store request complete" }),
		);
	});

	it.each([
		[200, "active"],
		[429, "standby"],
		[472, "recovery"],
		[473, "performance"],
		[501, "uninitialized"],
		[503, "sealed"],
	])("maps health status code %i to %s", async (code, status) => {
		store.healthCode = code;
		await expect(createClient().health()).resolves.toBe(status);
		expect(store.calls.at(-1)?.token).toBeNull();
	});

	it("rejects an unknown health status code", async () => {
		store.healthCode = 500;
		await expect(createClient().health()).rejects.toMatchObject({
			kind: "store",
			message: "Invalid status code from health: 500",
		});
	});

	it("lists mounts once authenticated", async () => {
		const client = createClient();
		await client.login();

		await expect(client.listMounts()).resolves.toEqual({
			"passwords/": { type: "kv", options: { version: "2" } },
		});
	});

	it("returns the raw token lookup", async () => {
		const client = createClient();
		await client.login();

		await expect(client.lookupToken()).resolves.toEqual({
			data: { id: "test-token-1", policies: ["default"], ttl: 3600 },
		});
	});

	it("logs out and forgets the token", async () => {
		const client = createClient();
		await client.login();

		await client.logout();

		expect(client.cache.get(CACHE_KEYS.TOKEN)).toBeNull();
		expect(client.session.sessionState).toEqual({ status: "unauthenticated" });
	});
});
