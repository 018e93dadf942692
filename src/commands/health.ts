import chalk from "chalk";
import type { Command } from "commander";

import { reportCommandError, withClient } from "../cli/context.js";
import { getChildLogger } from "../logging.js";
import type { HealthStatus } from "../store/index.js";

const STATUS_COLORS: Record<HealthStatus, (text: string) => string> = {
	active: chalk.green,
	standby: chalk.cyan,
	performance: chalk.cyan,
	recovery: chalk.yellow,
	uninitialized: chalk.red,
	sealed: chalk.red,
};

export function registerHealthCommand(program: Command): void {
	program
		.command("health")
		.description("Show the server's health status")
		.action(async () => {
			const logger = getChildLogger({ module: "cmd-health" });
			try {
				await withClient(async (client) => {
					const status = await client.health();
					console.log(STATUS_COLORS[status](status));
				});
			} catch (err) {
				reportCommandError(logger, "health", err);
			}
		});
}
