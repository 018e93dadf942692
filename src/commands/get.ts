import type { Command } from "commander";

import { reportCommandError, withClient } from "../cli/context.js";
import { getChildLogger } from "../logging.js";
import { revealRecord } from "../services/reveal.js";
import { SecretPath } from "../store/index.js";
import { buildRevealIo } from "./find.js";

export function registerGetCommand(program: Command): void {
	program
		.command("get")
		.description("Reveal the entry at an exact path")
		.argument("<path>", "Entry path, e.g. web/email")
		.action(async (rawPath: string) => {
			const logger = getChildLogger({ module: "cmd-get" });
			try {
				await withClient(async (client, config) => {
					await client.login();
					const record = await client.get(SecretPath.parse(rawPath));
					await revealRecord(record, buildRevealIo(config));
				});
			} catch (err) {
				reportCommandError(logger, "get", err);
			}
		});
}
