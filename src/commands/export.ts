/**
 * Export every entry to a local JSON file (owner-only permissions).
 *
 * Without --force the export only runs when the last one is older than
 * export.intervalHours.
 */

import chalk from "chalk";
import type { Command } from "commander";

import { reportCommandError, withClient } from "../cli/context.js";
import { getChildLogger } from "../logging.js";
import { runExport } from "../services/exporter.js";
import { KvError } from "../store/index.js";
import { expandHome } from "../utils.js";

const DEFAULT_INTERVAL_HOURS = 24;

export function registerExportCommand(program: Command): void {
	program
		.command("export")
		.description("Export all entries to a local JSON file")
		.option("--out <file>", "Output file (default: export.file from config)")
		.option("--force", "Export even if the last export is recent")
		.action(async (opts: { out?: string; force?: boolean }) => {
			const logger = getChildLogger({ module: "cmd-export" });
			try {
				await withClient(async (client, config) => {
					const file = opts.out ?? config.export?.file;
					if (!file) {
						throw new KvError("local", "No export file: pass --out or set export.file in the config");
					}
					await client.login();
					const outcome = await runExport(client, {
						file: expandHome(file),
						intervalHours: config.export?.intervalHours ?? DEFAULT_INTERVAL_HOURS,
						force: opts.force,
					});
					if (outcome.exported) {
						console.log(chalk.green(`Exported ${outcome.count} entries to ${outcome.file}`));
					} else {
						console.log("Last export is recent; use --force to export anyway.");
					}
				});
			} catch (err) {
				reportCommandError(logger, "export", err);
			}
		});
}
