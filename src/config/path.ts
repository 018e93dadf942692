import os from "node:os";
import path from "node:path";

/**
 * State directory for config, token cache and logs.
 * KVHUNT_DATA_DIR moves it; the default is ~/.kvhunt.
 */
export function resolveDataDir(): string {
	return process.env.KVHUNT_DATA_DIR ?? path.join(os.homedir(), ".kvhunt");
}

/**
 * Global config path override. Set via CLI or programmatically.
 */
let configPathOverride: string | null = null;

/**
 * Resolve the config file path from:
 * 1. Programmatic override (set via setConfigPath)
 * 2. KVHUNT_CONFIG environment variable
 * 3. Default: ~/.kvhunt/kvhunt.json
 */
export function resolveConfigPath(): string {
	if (configPathOverride) {
		return configPathOverride;
	}

	const envPath = process.env.KVHUNT_CONFIG;
	if (envPath) {
		return envPath;
	}

	return path.join(resolveDataDir(), "kvhunt.json");
}

/**
 * Set the config path override. Called from CLI parsing.
 */
export function setConfigPath(configPath: string | null): void {
	configPathOverride = configPath;
}

/**
 * Reset config path to default (for testing).
 */
export function resetConfigPath(): void {
	configPathOverride = null;
}
