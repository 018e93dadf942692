import { createInterface } from "node:readline";

import { KvError } from "../store/index.js";

export type PromptStreams = {
	input: NodeJS.ReadableStream;
	output: NodeJS.WritableStream;
};

/**
 * Prompt for a line of input. Rejects if input ends before a line arrives.
 */
export async function promptLine(
	question: string,
	streams: PromptStreams = { input: process.stdin, output: process.stdout },
): Promise<string> {
	const rl = createInterface(streams);

	return new Promise((resolve, reject) => {
		let answered = false;
		rl.on("close", () => {
			if (!answered) {
				reject(new KvError("local", "Input closed before an answer was given"));
			}
		});
		rl.question(question, (answer) => {
			answered = true;
			rl.close();
			resolve(answer);
		});
	});
}

/**
 * Prompt for a password without echoing it. Requires a TTY on stdin.
 */
export async function promptSecret(prompt: string): Promise<string> {
	return new Promise((resolve, reject) => {
		if (!process.stdin.isTTY) {
			reject(new Error("Cannot read a password: stdin is not a terminal"));
			return;
		}

		process.stdout.write(prompt);
		process.stdin.setRawMode(true);
		process.stdin.resume();

		let secret = "";
		const finish = () => {
			process.stdin.setRawMode(false);
			process.stdin.removeListener("data", handler);
			process.stdin.pause();
			process.stdout.write("\n");
		};
		const handler = (chunk: Buffer) => {
			for (const c of chunk.toString("utf-8")) {
				if (c === "\n" || c === "\r" || c === "\u0004") {
					finish();
					resolve(secret);
					return;
				}
				if (c === "\u0003") {
					// Ctrl+C
					finish();
					reject(new Error("Password prompt cancelled"));
					return;
				}
				if (c === "\u007F" || c === "\b") {
					secret = secret.slice(0, -1);
				} else {
					secret += c;
				}
			}
		};
		process.stdin.on("data", handler);
	});
}
