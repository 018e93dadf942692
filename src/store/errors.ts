/**
 * Error taxonomy for the secret-store client.
 *
 * - transport: the server could not be reached (connection, TLS, timeout)
 * - auth-rejected: bad credentials or an explicit error payload on login
 * - store: the exchange succeeded but the store answered with an error
 * - malformed-response: the body is not JSON or has an unexpected shape
 * - no-credential-source: no usable cached token and no way to ask for a password
 * - local: cache file, certificate, config or clipboard failures on this machine
 */

export type KvErrorKind =
	| "transport"
	| "auth-rejected"
	| "store"
	| "malformed-response"
	| "no-credential-source"
	| "local";

export class KvError extends Error {
	readonly kind: KvErrorKind;
	/** HTTP status, when the error came from a completed exchange. */
	readonly status?: number;

	constructor(kind: KvErrorKind, message: string, options?: { cause?: unknown; status?: number }) {
		super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
		this.name = "KvError";
		this.kind = kind;
		if (options?.status !== undefined) {
			this.status = options.status;
		}
	}
}

export function isKvError(err: unknown, kind?: KvErrorKind): err is KvError {
	return err instanceof KvError && (kind === undefined || err.kind === kind);
}

/**
 * First message of an `errors` array in a store response body, if any.
 * The store reports failures this way even on some 2xx answers.
 */
export function firstErrorMessage(body: unknown): string | null {
	if (typeof body !== "object" || body === null || !("errors" in body)) return null;
	const errors: unknown = body.errors;
	if (!Array.isArray(errors) || errors.length === 0) return null;
	const first: unknown = errors[0];
	return typeof first === "string" ? first : null;
}
