import chalk from "chalk";
import type { Command } from "commander";

import { reportCommandError, withClient } from "../cli/context.js";
import { getChildLogger } from "../logging.js";
import { PATH_SEPARATOR, SecretPath } from "../store/index.js";

export function registerLsCommand(program: Command): void {
	program
		.command("ls")
		.description("List the entries directly under a directory")
		.argument("[path]", "Directory path (default: root)", "")
		.option("--json", "Output as JSON")
		.action(async (rawPath: string, opts: { json?: boolean }) => {
			const logger = getChildLogger({ module: "cmd-ls" });
			try {
				await withClient(async (client) => {
					await client.login();
					const entries = await client.list(SecretPath.parse(rawPath));

					if (opts.json) {
						console.log(JSON.stringify(entries, null, 2));
						return;
					}
					for (const entry of entries) {
						console.log(
							entry.kind === "dir" ? chalk.blue(`${entry.name}${PATH_SEPARATOR}`) : entry.name,
						);
					}
				});
			} catch (err) {
				reportCommandError(logger, "ls", err);
			}
		});
}
