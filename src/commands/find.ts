/**
 * Default command: search the tree for a key name and reveal the entry.
 *
 * Usage: kvhunt [find] <pattern>
 */

import chalk from "chalk";
import type { Command } from "commander";
import type { Logger } from "pino";

import { promptLine } from "../cli/prompt.js";
import { reportCommandError, withClient } from "../cli/context.js";
import { type KvhuntConfig, resolveClipboardCommand } from "../config/config.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { copyToClipboard } from "../services/clipboard.js";
import { runExport } from "../services/exporter.js";
import { type SearchRevealIo, searchReveal } from "../services/reveal.js";
import type { SecretStoreClient } from "../store/index.js";
import { expandHome } from "../utils.js";

export function buildRevealIo(config: KvhuntConfig): SearchRevealIo {
	const clipboard = resolveClipboardCommand(config);
	return {
		print: (line) => console.log(line),
		copy: (password) => copyToClipboard(password, clipboard),
		ask: (question) => promptLine(question),
	};
}

/**
 * `--logout`: revoke the cached token if one can be read. An unreadable cache
 * is logged and skipped; the login that follows replaces it.
 */
export async function logoutCachedSession(client: SecretStoreClient, logger: Logger): Promise<boolean> {
	let cached: boolean;
	try {
		cached = client.useCachedToken();
	} catch (err) {
		logger.warn({ error: formatErrorSafe(err) }, "token cache unreadable; skipping logout");
		return false;
	}
	if (!cached) return false;
	await client.logout();
	return true;
}

export function registerFindCommand(program: Command): void {
	program
		.command("find", { isDefault: true })
		.description("Search entries by key name (case-insensitive) and reveal one")
		.argument("<pattern>", "Substring of the key name")
		.option("--logout", "Logout before doing anything")
		.action(async (pattern: string, opts: { logout?: boolean }) => {
			const logger = getChildLogger({ module: "cmd-find" });
			try {
				await withClient(async (client, config) => {
					if (opts.logout) {
						await logoutCachedSession(client, logger);
					}
					await client.login();

					if (config.export) {
						const outcome = await runExport(client, {
							file: expandHome(config.export.file),
							intervalHours: config.export.intervalHours,
						});
						if (outcome.exported) {
							console.error(chalk.dim(`Exported ${outcome.count} entries to ${outcome.file}`));
						}
					}

					await searchReveal(client, pattern, buildRevealIo(config));
				});
			} catch (err) {
				reportCommandError(logger, "find", err);
			}
		});
}
