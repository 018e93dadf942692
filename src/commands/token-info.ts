import type { Command } from "commander";

import { reportCommandError, withClient } from "../cli/context.js";
import { getChildLogger } from "../logging.js";
import { KvError } from "../store/index.js";

export function registerTokenInfoCommand(program: Command): void {
	program
		.command("token-info")
		.description("Print what the server knows about the cached token")
		.action(async () => {
			const logger = getChildLogger({ module: "cmd-token-info" });
			try {
				await withClient(async (client) => {
					if (!client.useCachedToken()) {
						throw new KvError("no-credential-source", "No cached token. Run a search to log in.");
					}
					const info = await client.lookupToken();
					console.log(JSON.stringify(info, null, 2));
				});
			} catch (err) {
				reportCommandError(logger, "token-info", err);
			}
		});
}
