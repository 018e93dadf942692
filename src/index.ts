#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerExportCommand } from "./commands/export.js";
import { registerFindCommand } from "./commands/find.js";
import { registerGetCommand } from "./commands/get.js";
import { registerHealthCommand } from "./commands/health.js";
import { registerLogoutCommand } from "./commands/logout.js";
import { registerLsCommand } from "./commands/ls.js";
import { registerMountsCommand } from "./commands/mounts.js";
import { registerTokenInfoCommand } from "./commands/token-info.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, getLogger } from "./logging.js";

// Create CLI program
const program = createProgram();

// Register commands
registerFindCommand(program);
registerGetCommand(program);
registerLsCommand(program);
registerExportCommand(program);
registerLogoutCommand(program);
registerTokenInfoCommand(program);
registerMountsCommand(program);
registerHealthCommand(program);

// Global options must be applied before any config loading happens
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts<{ config?: string; verbose?: boolean }>();
	if (opts.config) {
		setConfigPath(opts.config);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	// Initialize logger after config path is set
	getLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err: unknown) => {
		// Commander prints some errors itself; keep this minimal.
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// Flush the pino destination so the CLI can exit cleanly.
		closeLogger();
	});
