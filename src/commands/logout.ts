import type { Command } from "commander";

import { reportCommandError, withClient } from "../cli/context.js";
import { getChildLogger } from "../logging.js";

export function registerLogoutCommand(program: Command): void {
	program
		.command("logout")
		.description("Revoke the cached token and clear it")
		.action(async () => {
			const logger = getChildLogger({ module: "cmd-logout" });
			try {
				await withClient(async (client) => {
					if (!client.useCachedToken()) {
						console.log("Not logged in.");
						return;
					}
					await client.logout();
					console.log("Logged out.");
				});
			} catch (err) {
				reportCommandError(logger, "logout", err);
			}
		});
}
