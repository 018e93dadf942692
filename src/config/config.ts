import fs from "node:fs";
import path from "node:path";

import JSON5 from "json5";
import { z } from "zod";

import type { StoreClientSettings } from "../store/client.js";
import { KvError } from "../store/errors.js";
import { expandHome } from "../utils.js";
import { resolveConfigPath, resolveDataDir } from "./path.js";

const DEFAULT_ENDPOINT = "https://localhost:8200/";

// Breadth-first traversal tuning
const TraversalConfigSchema = z.object({
	// Number of directory listings issued at once within one level
	concurrency: z.number().int().positive().default(1),
});

// Periodic local export of every entry
const ExportConfigSchema = z.object({
	file: z.string().min(1),
	intervalHours: z.number().positive().default(24),
});

// Logging configuration schema
const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

// Main config schema
const KvhuntConfigSchema = z.object({
	endpoint: z.string().url().default(DEFAULT_ENDPOINT),
	username: z.string().min(1).optional(),
	// PEM files added to the trust roots for HTTPS
	caCerts: z.array(z.string()).default([]),
	tokenMaxTtlSeconds: z.number().int().positive().default(86_400),
	requestTimeoutMs: z.number().int().positive().default(30_000),
	// Program that receives the password on stdin (xclip / pbcopy by default)
	clipboardProgram: z.string().optional(),
	runtimeInfoFile: z.string().optional(),
	traversal: TraversalConfigSchema.default({}),
	export: ExportConfigSchema.optional(),
	logging: LoggingConfigSchema.optional(),
});

export type KvhuntConfig = z.infer<typeof KvhuntConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

let cachedConfig: KvhuntConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): KvhuntConfig {
	const configPath = resolveConfigPath();

	let stat: fs.Stats;
	try {
		stat = fs.statSync(configPath);
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") {
			// No config file - use defaults
			return KvhuntConfigSchema.parse({});
		}
		throw new KvError("local", `Cannot access config file ${configPath}`, { cause: err });
	}

	// Invalidate cache if path changed or mtime changed
	if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
		return cachedConfig;
	}

	let parsed: unknown;
	try {
		parsed = JSON5.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (err) {
		throw new KvError("local", `Failed to parse config file ${configPath}: ${String(err)}`, {
			cause: err,
		});
	}

	const result = KvhuntConfigSchema.safeParse(parsed);
	if (!result.success) {
		const issues = result.error.errors
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new KvError("local", `Invalid config file ${configPath}: ${issues}`);
	}

	cachedConfig = result.data;
	configMtime = stat.mtimeMs;
	cachedConfigPath = configPath;

	return result.data;
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}

/**
 * The configured username. Every store operation needs one.
 */
export function requireUsername(config: KvhuntConfig): string {
	if (!config.username) {
		throw new KvError("local", `No username configured (set "username" in ${resolveConfigPath()})`);
	}
	return config.username;
}

/**
 * Endpoint with exactly one trailing slash, so API paths can be appended directly.
 */
export function normalizeEndpoint(endpoint: string): string {
	return `${endpoint.replace(/\/+$/, "")}/`;
}

export function resolveRuntimeInfoPath(config: KvhuntConfig): string {
	return expandHome(config.runtimeInfoFile ?? path.join(resolveDataDir(), "runtime.json"));
}

/**
 * Resolve everything the store client needs, so the client itself never looks
 * at the environment or the config file.
 */
export function storeSettings(config: KvhuntConfig): StoreClientSettings {
	return {
		endpoint: normalizeEndpoint(config.endpoint),
		username: requireUsername(config),
		caCerts: config.caCerts.map(expandHome),
		tokenMaxTtlSeconds: config.tokenMaxTtlSeconds,
		requestTimeoutMs: config.requestTimeoutMs,
		runtimeInfoFile: resolveRuntimeInfoPath(config),
		traversalConcurrency: config.traversal.concurrency,
	};
}

/**
 * Clipboard command as argv, or null when no clipboard program is known for this platform.
 */
export function resolveClipboardCommand(
	config: KvhuntConfig,
	platform: NodeJS.Platform = process.platform,
): string[] | null {
	if (config.clipboardProgram) {
		const argv = config.clipboardProgram.trim().split(/\s+/).filter(Boolean);
		return argv.length > 0 ? argv : null;
	}
	switch (platform) {
		case "linux":
			return ["xclip", "-selection", "clipboard"];
		case "darwin":
			return ["pbcopy"];
		default:
			return null;
	}
}
