/**
 * Search-and-reveal workflow: find entries, let the user pick one, then show
 * its fields with the password going to the clipboard when possible.
 */

import { PASSWORD_FIELD, type SecretPath, type SecretRecord, type SecretStoreClient } from "../store/index.js";

export type RevealIo = {
	print: (line: string) => void;
	/** Resolves true when the password reached the clipboard. */
	copy: (password: string) => Promise<boolean>;
};

export type SearchRevealIo = RevealIo & {
	ask: (question: string) => Promise<string>;
};

/**
 * `key: value` lines for every field except the password, sorted by key.
 */
export function formatRecord(record: SecretRecord): string[] {
	return Object.keys(record)
		.filter((key) => key !== PASSWORD_FIELD)
		.sort()
		.map((key) => `${key}: ${record[key]}`);
}

export async function revealRecord(record: SecretRecord, io: RevealIo): Promise<void> {
	for (const line of formatRecord(record)) {
		io.print(line);
	}

	const password = record[PASSWORD_FIELD];
	if (password === undefined) return;
	if (await io.copy(password)) {
		io.print("Password copied to clipboard.");
	} else {
		io.print(`Password: ${password}`);
	}
}

/**
 * Index typed by the user, or null unless it is a whole number below `count`.
 */
export function parseChoice(input: string, count: number): number | null {
	const trimmed = input.trim();
	if (!/^\d+$/.test(trimmed)) return null;
	const choice = Number.parseInt(trimmed, 10);
	return choice < count ? choice : null;
}

export async function pickPath(paths: SecretPath[], io: SearchRevealIo): Promise<SecretPath> {
	paths.forEach((path, index) => {
		io.print(`${index}. ${path}`);
	});
	io.print("");

	for (;;) {
		const choice = parseChoice(await io.ask("Which entry? "), paths.length);
		const picked = choice === null ? undefined : paths[choice];
		if (picked) return picked;
		io.print("Invalid input");
	}
}

/**
 * Returns the revealed path, or null when nothing matched.
 */
export async function searchReveal(
	client: SecretStoreClient,
	pattern: string,
	io: SearchRevealIo,
): Promise<SecretPath | null> {
	const paths = await client.search(pattern);
	if (paths.length === 0) {
		io.print("No matching entry.");
		return null;
	}

	const picked = paths.length === 1 ? paths[0] : await pickPath(paths, io);
	await revealRecord(await client.get(picked), io);
	return picked;
}
