/**
 * Walks the secret tree. The only primitive is "list the children of one
 * directory"; search and export are breadth-first traversals built on it.
 */

import type { Logger } from "pino";

import { firstErrorMessage, KvError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { SecretPath } from "./path.js";
import { normalizeUsername } from "./session.js";
import { expectOk, type Transport } from "./transport.js";
import {
	ListResponseSchema,
	parseTreeEntry,
	type SecretRecord,
	SecretDataResponseSchema,
	type TreeEntry,
} from "./types.js";

const MOUNT = "passwords";

export type NavigatorOptions = {
	transport: Transport;
	username: string;
	/** Directory listings issued at once within one level. */
	concurrency?: number;
	logger?: Logger;
};

export type TraversalOptions = {
	/**
	 * Checked between round trips and relayed to each request. An abort rejects
	 * with the signal's reason wherever it lands; partial results are dropped.
	 */
	signal?: AbortSignal;
};

export type ExportedEntry = {
	path: SecretPath;
	record: SecretRecord;
};

export class SecretTreeNavigator {
	private readonly transport: Transport;
	private readonly username: string;
	private readonly concurrency: number;
	private readonly logger: Logger;

	constructor(options: NavigatorOptions) {
		this.transport = options.transport;
		this.username = normalizeUsername(options.username);
		this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
		this.logger = options.logger ?? silentLogger();
	}

	/**
	 * Immediate children of a directory.
	 */
	async list(path: SecretPath, options: TraversalOptions = {}): Promise<TreeEntry[]> {
		const response = await this.transport.request("LIST", this.apiPath("metadata", path), {
			signal: options.signal,
		});

		// An empty directory (or an empty mount) answers 404 with no messages.
		if (response.status === 404 && firstErrorMessage(response.body) === null) {
			return [];
		}

		const body = expectOk(response, `list "${path}"`);
		const parsed = ListResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new KvError("malformed-response", `List result for "${path}" is not a list of names`, {
				status: response.status,
			});
		}
		return parsed.data.data.keys.map(parseTreeEntry);
	}

	/**
	 * Field map stored at a leaf.
	 */
	async get(path: SecretPath, options: TraversalOptions = {}): Promise<SecretRecord> {
		if (path.isRoot) {
			throw new KvError("local", "The root of the tree holds no record");
		}
		const response = await this.transport.request("GET", this.apiPath("data", path), {
			signal: options.signal,
		});
		const body = expectOk(response, `read "${path}"`);
		const parsed = SecretDataResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new KvError("malformed-response", `Get result for "${path}" is not a field map`, {
				status: response.status,
			});
		}
		return parsed.data.data.data;
	}

	/**
	 * Paths of every key whose name contains `pattern`, case-insensitively.
	 * The empty pattern matches every key.
	 */
	async search(pattern: string, options: TraversalOptions = {}): Promise<SecretPath[]> {
		const needle = pattern.toLowerCase();
		const matches: SecretPath[] = [];
		await this.walk(options, (keyPath, name) => {
			if (name.toLowerCase().includes(needle)) {
				matches.push(keyPath);
			}
		});
		this.logger.debug({ matches: matches.length }, "search complete");
		return matches;
	}

	/**
	 * Every key in the tree together with its record.
	 */
	async exportAll(options: TraversalOptions = {}): Promise<ExportedEntry[]> {
		const entries: ExportedEntry[] = [];
		await this.walk(options, async (keyPath) => {
			options.signal?.throwIfAborted();
			entries.push({ path: keyPath, record: await this.get(keyPath, options) });
		});
		this.logger.debug({ entries: entries.length }, "export traversal complete");
		return entries;
	}

	/**
	 * Breadth-first walk from the root. Keys are reported and never expanded;
	 * directories form the next level's frontier.
	 */
	private async walk(
		options: TraversalOptions,
		onKey: (keyPath: SecretPath, name: string) => void | Promise<void>,
	): Promise<void> {
		let frontier: SecretPath[] = [SecretPath.root()];
		let level = 0;

		while (frontier.length > 0) {
			const next: SecretPath[] = [];
			for (let start = 0; start < frontier.length; start += this.concurrency) {
				options.signal?.throwIfAborted();
				const batch = frontier.slice(start, start + this.concurrency);
				const listings = await Promise.all(
					batch.map(async (dir) => ({ dir, entries: await this.list(dir, options) })),
				);
				for (const { dir, entries } of listings) {
					for (const entry of entries) {
						const child = dir.pushed(entry.name);
						if (entry.kind === "dir") {
							next.push(child);
						} else {
							await onKey(child, entry.name);
						}
					}
				}
			}
			this.logger.debug({ level, directories: frontier.length }, "traversal level listed");
			frontier = next;
			level += 1;
		}
	}

	private apiPath(kind: "metadata" | "data", path: SecretPath): string {
		const segments = path.components.map(encodeURIComponent).join("/");
		return `v1/${MOUNT}/${kind}/${encodeURIComponent(this.username)}/${segments}`;
	}
}
