import type { Command } from "commander";

import { reportCommandError, withClient } from "../cli/context.js";
import { getChildLogger } from "../logging.js";

export function registerMountsCommand(program: Command): void {
	program
		.command("mounts")
		.description("List mounted secret engines")
		.action(async () => {
			const logger = getChildLogger({ module: "cmd-mounts" });
			try {
				await withClient(async (client) => {
					await client.login();
					const mounts = await client.listMounts();
					console.log(JSON.stringify(mounts, null, 2));
				});
			} catch (err) {
				reportCommandError(logger, "mounts", err);
			}
		});
}
