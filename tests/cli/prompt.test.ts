import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";

import { promptLine } from "../../src/cli/prompt.js";

describe("promptLine", () => {
	it("resolves with the typed line", async () => {
		const input = new PassThrough();
		const output = new PassThrough();

		const answer = promptLine("Which entry? ", { input, output });
		input.write("1\n");

		await expect(answer).resolves.toBe("1");
	});

	it("rejects when input ends before a line arrives", async () => {
		const input = new PassThrough();
		const output = new PassThrough();

		const answer = promptLine("Which entry? ", { input, output });
		input.end();

		await expect(answer).rejects.toMatchObject({
			kind: "local",
			message: "Input closed before an answer was given",
		});
	});
});
