/**
 * Runtime info file: a single JSON object holding the cached session token
 * and the last export time between CLI invocations.
 *
 * Not safe for concurrent writers from several processes.
 */

import { readFileSync } from "node:fs";

import { writeFileAtomic } from "../utils.js";
import { KvError } from "./errors.js";

export const CACHE_KEYS = {
	TOKEN: "token",
	LAST_EXPORT: "lastExport",
} as const;

export type CacheKey = (typeof CACHE_KEYS)[keyof typeof CACHE_KEYS];

export class TokenCache {
	readonly filePath: string;

	constructor(filePath: string) {
		this.filePath = filePath;
	}

	/**
	 * A missing file means "no value". A file that exists but cannot be read or
	 * parsed is an error.
	 */
	get(key: CacheKey): string | null {
		const data = this.read();
		if (!data) return null;
		const value = data[key];
		if (value === undefined || value === null) return null;
		if (typeof value !== "string") {
			throw new KvError("local", `Invalid runtime info: "${key}" is not a string`);
		}
		return value;
	}

	/**
	 * Store a value; null removes the key.
	 */
	set(key: CacheKey, value: string | null): void {
		const data = this.read() ?? {};
		if (value === null) {
			delete data[key];
		} else {
			data[key] = value;
		}
		try {
			writeFileAtomic(this.filePath, `${JSON.stringify(data, null, 2)}\n`);
		} catch (err) {
			throw new KvError("local", `Failed to write runtime info file ${this.filePath}`, {
				cause: err,
			});
		}
	}

	private read(): Record<string, unknown> | null {
		let raw: string;
		try {
			raw = readFileSync(this.filePath, "utf-8");
		} catch (err) {
			if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
			throw new KvError("local", `Failed to open runtime info file ${this.filePath}`, {
				cause: err,
			});
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err) {
			throw new KvError("local", `Failed to read JSON from runtime info file ${this.filePath}`, {
				cause: err,
			});
		}
		if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
			throw new KvError("local", `Runtime info file ${this.filePath} is not a JSON object`);
		}
		return Object.fromEntries(Object.entries(parsed));
	}
}
