import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { KvError } from "../../src/store/errors.js";
import { CACHE_KEYS, TokenCache } from "../../src/store/token-cache.js";

describe("TokenCache", () => {
	let dir: string;
	let file: string;

	beforeEach(() => {
		dir = mkdtempSync(join(os.tmpdir(), "kvhunt-cache-"));
		file = join(dir, "state", "runtime.json");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("returns null when the file does not exist", () => {
		const cache = new TokenCache(file);
		expect(cache.get(CACHE_KEYS.TOKEN)).toBeNull();
	});

	it("creates the file with owner-only permissions on first write", () => {
		const cache = new TokenCache(file);
		cache.set(CACHE_KEYS.TOKEN, "test-token");

		expect(cache.get(CACHE_KEYS.TOKEN)).toBe("test-token");
		expect(statSync(file).mode & 0o777).toBe(0o600);
		expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual({ token: "test-token" });
	});

	it("keeps other keys when updating one", () => {
		const cache = new TokenCache(file);
		cache.set(CACHE_KEYS.LAST_EXPORT, "2026-01-01T00:00:00.000Z");
		cache.set(CACHE_KEYS.TOKEN, "test-token");

		expect(cache.get(CACHE_KEYS.LAST_EXPORT)).toBe("2026-01-01T00:00:00.000Z");
		expect(cache.get(CACHE_KEYS.TOKEN)).toBe("test-token");
	});

	it("removes the key when set to null", () => {
		const cache = new TokenCache(file);
		cache.set(CACHE_KEYS.TOKEN, "test-token");
		cache.set(CACHE_KEYS.LAST_EXPORT, "2026-01-01T00:00:00.000Z");
		cache.set(CACHE_KEYS.TOKEN, null);

		expect(cache.get(CACHE_KEYS.TOKEN)).toBeNull();
		expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual({
			lastExport: "2026-01-01T00:00:00.000Z",
		});
	});

	it("treats a stored null as no value", () => {
		const plain = join(dir, "runtime.json");
		writeFileSync(plain, JSON.stringify({ token: null }));
		expect(new TokenCache(plain).get(CACHE_KEYS.TOKEN)).toBeNull();
	});

	it("fails on a corrupt file that exists", () => {
		const plain = join(dir, "runtime.json");
		writeFileSync(plain, "{ not json");
		const cache = new TokenCache(plain);

		expect(() => cache.get(CACHE_KEYS.TOKEN)).toThrow(KvError);
		expect(() => cache.get(CACHE_KEYS.TOKEN)).toThrow("Failed to read JSON from runtime info file");
		expect(() => cache.set(CACHE_KEYS.TOKEN, "test-token")).toThrow(KvError);
	});

	it("fails when the file is not a JSON object or holds a non-string value", () => {
		const plain = join(dir, "runtime.json");
		writeFileSync(plain, "[1, 2]");
		expect(() => new TokenCache(plain).get(CACHE_KEYS.TOKEN)).toThrow("is not a JSON object");

		writeFileSync(plain, JSON.stringify({ token: 42 }));
		expect(() => new TokenCache(plain).get(CACHE_KEYS.TOKEN)).toThrow(
			'Invalid runtime info: "token" is not a string',
		);
	});
});
