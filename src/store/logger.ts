import pino, { type Logger } from "pino";

/**
 * Fallback for components built without an injected logger.
 */
export function silentLogger(): Logger {
	return pino({ enabled: false });
}
