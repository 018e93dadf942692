/**
 * Copy a password to the system clipboard by piping it to a helper program
 * (xclip, pbcopy or whatever the config names).
 */

import { spawn } from "node:child_process";

import { getChildLogger } from "../logging.js";
import { KvError } from "../store/index.js";

/**
 * Resolves false when the program cannot be started (e.g. not installed), so
 * the caller can fall back to printing. A program that runs and fails is an error.
 */
export async function copyToClipboard(
	content: string,
	command: readonly string[] | null,
): Promise<boolean> {
	const logger = getChildLogger({ module: "clipboard" });
	const [program, ...args] = command ?? [];
	if (!program) return false;

	return new Promise((resolve, reject) => {
		let settled = false;

		const proc = spawn(program, args, {
			stdio: ["pipe", "ignore", "ignore"],
		});

		proc.on("error", (error: NodeJS.ErrnoException) => {
			if (settled) return;
			settled = true;
			if (error.code === "ENOENT") {
				logger.debug({ program }, "clipboard program not found");
				resolve(false);
				return;
			}
			reject(new KvError("local", `Failed to run ${program}: ${error.message}`, { cause: error }));
		});

		proc.on("close", (code) => {
			if (settled) return;
			settled = true;
			if (code === 0) {
				resolve(true);
			} else {
				reject(new KvError("local", `Clipboard program failed with code: ${code ?? "??"}`));
			}
		});

		// EPIPE when the program exits early; the close handler reports the outcome.
		proc.stdin.on("error", (error) => {
			logger.debug({ program, error: error.message }, "clipboard stdin closed early");
		});
		proc.stdin.end(content);
	});
}
