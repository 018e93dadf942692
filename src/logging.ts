import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { type LoggingConfig, loadConfig } from "./config/config.js";
import { resolveDataDir } from "./config/path.js";
import { isVerbose } from "./globals.js";
import { expandHome } from "./utils.js";

type ResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};

let cachedLogger: Logger | null = null;
let cachedSettings: ResolvedSettings | null = null;
type Destination = ReturnType<typeof pino.destination>;

let cachedDestination: Destination | null = null;

function loggingConfig(): LoggingConfig | undefined {
	try {
		return loadConfig().logging;
	} catch {
		// A broken config file is reported by the command that loads it.
		return undefined;
	}
}

function resolveSettings(): ResolvedSettings {
	const cfg = loggingConfig();
	const level: LevelWithSilent = isVerbose() ? "debug" : (cfg?.level ?? "info");
	const file = expandHome(cfg?.file ?? path.join(resolveDataDir(), "logs", "kvhunt.log"));
	return { level, file };
}

function settingsChanged(a: ResolvedSettings | null, b: ResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: Destination): void {
	// Flush and close so short CLI runs can exit cleanly.
	try {
		dest.flushSync();
		dest.end();
	} catch (err) {
		process.stderr.write(`kvhunt: failed to flush log file: ${String(err)}\n`);
	}
}

function buildLogger(settings: ResolvedSettings): {
	logger: Logger;
	destination: Destination;
} {
	const logDir = path.dirname(settings.file);
	fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });

	// Ensure file exists with 0600; log lines carry store paths
	try {
		const fd = fs.openSync(
			settings.file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		// EEXIST is fine; other errors surface from pino.destination below
		if ((err as NodeJS.ErrnoException).code !== "EEXIST") {
			process.stderr.write(`kvhunt: cannot create log file: ${String(err)}\n`);
		}
	}

	const destination = pino.destination({
		dest: settings.file,
		mkdir: true,
		sync: true, // deterministic for short-lived CLI runs
	});
	const logger = pino(
		{
			level: settings.level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination,
	);
	return { logger, destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

export function getChildLogger(bindings?: Bindings, opts?: { level?: LevelWithSilent }): Logger {
	return getLogger().child(bindings ?? {}, opts);
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
