/**
 * Local export of the whole tree: a JSON document with every entry, written
 * with owner-only permissions. Runs at most once per configured interval,
 * tracked through the `lastExport` marker in the runtime info file.
 */

import { getChildLogger } from "../logging.js";
import {
	CACHE_KEYS,
	type ExportedEntry,
	KvError,
	type SecretRecord,
	type SecretStoreClient,
} from "../store/index.js";
import { writeFileAtomic } from "../utils.js";

export type ExportDocument = {
	exportedAt: string;
	entries: Array<{ path: string; fields: SecretRecord }>;
};

export type ExportOptions = {
	file: string;
	intervalHours: number;
	/** Export even if the last one is recent. */
	force?: boolean;
	now?: Date;
	signal?: AbortSignal;
};

export type ExportOutcome = { exported: false } | { exported: true; count: number; file: string };

const HOUR_MS = 60 * 60 * 1000;

export function buildExportDocument(entries: ExportedEntry[], now: Date): ExportDocument {
	return {
		exportedAt: now.toISOString(),
		entries: entries
			.map((entry) => ({ path: entry.path.toString(), fields: entry.record }))
			.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
	};
}

/**
 * Due when there is no usable marker or the last export is older than the interval.
 */
export function isExportDue(lastExport: string | null, intervalHours: number, now: Date): boolean {
	if (!lastExport) return true;
	const last = Date.parse(lastExport);
	if (Number.isNaN(last)) return true;
	return now.getTime() - last >= intervalHours * HOUR_MS;
}

export async function runExport(
	client: SecretStoreClient,
	options: ExportOptions,
): Promise<ExportOutcome> {
	const logger = getChildLogger({ module: "exporter" });
	const now = options.now ?? new Date();

	if (!options.force && !isExportDue(client.cache.get(CACHE_KEYS.LAST_EXPORT), options.intervalHours, now)) {
		logger.debug({ file: options.file }, "export not due");
		return { exported: false };
	}

	const entries = await client.exportAll({ signal: options.signal });
	const document = buildExportDocument(entries, now);
	try {
		writeFileAtomic(options.file, `${JSON.stringify(document, null, 2)}\n`);
	} catch (err) {
		throw new KvError("local", `Failed to write export file ${options.file}`, { cause: err });
	}
	client.cache.set(CACHE_KEYS.LAST_EXPORT, document.exportedAt);

	logger.info({ file: options.file, count: document.entries.length }, "export written");
	return { exported: true, count: document.entries.length, file: options.file };
}
