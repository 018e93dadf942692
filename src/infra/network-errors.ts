/**
 * Classification of fetch failures for the secret-store transport.
 *
 * undici wraps the interesting error (socket, TLS, DNS) in `cause`, sometimes
 * several levels deep, so classification walks the whole cause chain.
 */

export type NetworkFailureKind = "timeout" | "tls" | "dns" | "refused" | "aborted" | "network";

const TLS_CODES = new Set([
	"UNABLE_TO_VERIFY_LEAF_SIGNATURE",
	"UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
	"SELF_SIGNED_CERT_IN_CHAIN",
	"DEPTH_ZERO_SELF_SIGNED_CERT",
	"CERT_HAS_EXPIRED",
	"ERR_TLS_CERT_ALTNAME_INVALID",
	"ERR_SSL_WRONG_VERSION_NUMBER",
]);

const TIMEOUT_CODES = new Set([
	"ETIMEDOUT",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);

const REFUSED_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "EHOSTUNREACH", "ENETUNREACH"]);

const FAILURE_LABELS: Record<NetworkFailureKind, string> = {
	timeout: "request timed out",
	tls: "TLS handshake failed (check caCerts)",
	dns: "host name could not be resolved",
	refused: "connection refused or reset",
	aborted: "request aborted",
	network: "network error",
};

/**
 * Collect all error candidates from a (potentially nested) error.
 * BFS through `.cause`, `.reason`, `.errors` to find all relevant error objects.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null || typeof val !== "object") {
			if (val != null) candidates.push(val);
			continue;
		}

		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		if ("cause" in val && val.cause != null) {
			queue.push({ value: val.cause, depth: nextDepth });
		}
		if ("reason" in val && val.reason != null) {
			queue.push({ value: val.reason, depth: nextDepth });
		}
		if ("errors" in val && Array.isArray(val.errors)) {
			for (const e of val.errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

function fieldOf(candidate: unknown, field: "code" | "name"): string | null {
	if (typeof candidate !== "object" || candidate === null) return null;
	const value: unknown = Reflect.get(candidate, field);
	return typeof value === "string" ? value : null;
}

/**
 * Check if an error is an AbortError (caller cancellation, not a timeout).
 */
export function isAbortError(err: unknown): boolean {
	return collectErrorCandidates(err).some(
		(candidate) =>
			fieldOf(candidate, "name") === "AbortError" || fieldOf(candidate, "code") === "ABORT_ERR",
	);
}

/**
 * Work out why a request never produced a response.
 */
export function classifyNetworkFailure(err: unknown): NetworkFailureKind {
	const candidates = collectErrorCandidates(err);

	// Timeouts abort the request too, so they are checked before aborts.
	for (const candidate of candidates) {
		if (fieldOf(candidate, "name") === "TimeoutError") return "timeout";
		const code = fieldOf(candidate, "code");
		if (code && TIMEOUT_CODES.has(code)) return "timeout";
	}
	for (const candidate of candidates) {
		const code = fieldOf(candidate, "code");
		if (!code) continue;
		if (TLS_CODES.has(code)) return "tls";
		if (DNS_CODES.has(code)) return "dns";
		if (REFUSED_CODES.has(code)) return "refused";
	}
	if (isAbortError(err)) return "aborted";
	return "network";
}

export function describeNetworkFailure(err: unknown): string {
	return FAILURE_LABELS[classifyNetworkFailure(err)];
}

/**
 * Safely format an error to a string, avoiding circular references
 * and redacting URLs that might contain tokens.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(redactUrls(msg), maxLength);
		}
		return truncate(redactUrls(String(err)), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function redactUrls(str: string): string {
	return str.replace(/https?:\/\/[^\s]+/g, "[URL]");
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
