/**
 * Wiring shared by the commands: config → client, plus error reporting.
 */

import type { Logger } from "pino";

import { type KvhuntConfig, loadConfig, storeSettings } from "../config/config.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getLogger } from "../logging.js";
import { createSecretStoreClient, isKvError, type PasswordSource, type SecretStoreClient } from "../store/index.js";
import { promptSecret } from "./prompt.js";

/**
 * Interactive prompt when stdin is a terminal, else KVHUNT_PASSWORD if set.
 * Neither → the session reports that no credential source exists.
 */
function resolvePasswordSource(): PasswordSource | undefined {
	if (process.stdin.isTTY) {
		return () => promptSecret("Password: ");
	}
	const fromEnv = process.env.KVHUNT_PASSWORD;
	if (fromEnv) {
		return async () => fromEnv;
	}
	return undefined;
}

/**
 * Run `fn` with a client built from the current config and release its
 * connections afterwards.
 */
export async function withClient<T>(
	fn: (client: SecretStoreClient, config: KvhuntConfig) => Promise<T>,
): Promise<T> {
	const config = loadConfig();
	const client = createSecretStoreClient(storeSettings(config), {
		passwordSource: resolvePasswordSource(),
		onWarning: (message) => console.error(message),
		logger: getLogger(),
	});
	try {
		return await fn(client, config);
	} finally {
		await client.close();
	}
}

/**
 * Log and print a failed command, and mark the process as failed.
 */
export function reportCommandError(logger: Logger, command: string, err: unknown): void {
	logger.error(
		{ error: formatErrorSafe(err), kind: isKvError(err) ? err.kind : undefined },
		`${command} failed`,
	);
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
	process.exitCode = 1;
}
