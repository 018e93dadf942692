/**
 * HTTPS transport for the secret store.
 *
 * Sends one request, signs it with the session token when there is one, and
 * returns the parsed JSON body. Never retries: callers decide what to do with
 * a failure.
 */

import { readFileSync } from "node:fs";
import { rootCertificates } from "node:tls";

import type { Logger } from "pino";
import { Agent } from "undici";

import { type FetchImpl, fetchWithTimeout } from "../infra/timeout.js";
import { describeNetworkFailure, formatErrorSafe } from "../infra/network-errors.js";
import { firstErrorMessage, KvError } from "./errors.js";
import { silentLogger } from "./logger.js";

export type HttpMethod = "GET" | "POST" | "LIST";

/** Supplies the current bearer token; null while unauthenticated. */
export type TokenProvider = () => string | null;

export type TransportOptions = {
	/** Base URL of the store, e.g. `https://vault.example:8200/`. */
	endpoint: string;
	/** PEM files added to the default trust roots. */
	caCerts?: readonly string[];
	timeoutMs?: number;
	fetchImpl?: FetchImpl;
	logger?: Logger;
};

export type RequestOptions = {
	body?: unknown;
	/** Send the bearer token if one is held. Defaults to true. */
	authenticated?: boolean;
	signal?: AbortSignal;
};

export type TransportResponse = {
	status: number;
	ok: boolean;
	/** Parsed JSON, null for an empty body, raw text for an unparsable error body. */
	body: unknown;
};

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/;

/**
 * Read the configured CA files. Any unreadable or non-PEM file is fatal.
 */
export function loadCaCertificates(files: readonly string[]): string[] {
	return files.map((file) => {
		let pem: string;
		try {
			pem = readFileSync(file, "utf-8");
		} catch (err) {
			throw new KvError("local", `Failed to read CA certificate ${file}`, { cause: err });
		}
		if (!PEM_CERTIFICATE.test(pem)) {
			throw new KvError("local", `Invalid CA certificate ${file}: no PEM certificate block`);
		}
		return pem;
	});
}

export class Transport {
	private readonly endpoint: string;
	private readonly timeoutMs: number;
	private readonly fetchImpl: FetchImpl;
	private readonly dispatcher: Agent | null;
	private readonly logger: Logger;
	private tokenProvider: TokenProvider = () => null;

	constructor(options: TransportOptions) {
		this.endpoint = `${options.endpoint.replace(/\/+$/, "")}/`;
		this.timeoutMs = options.timeoutMs ?? 30_000;
		this.logger = options.logger ?? silentLogger();

		const extraCa = loadCaCertificates(options.caCerts ?? []);
		this.dispatcher =
			extraCa.length > 0 ? new Agent({ connect: { ca: [...rootCertificates, ...extraCa] } }) : null;

		const dispatcher = this.dispatcher;
		this.fetchImpl =
			options.fetchImpl ??
			(dispatcher
				? // undici's Agent type doesn't line up with the Dispatcher type on the global
					// RequestInit (separate undici-types copy); Agent extends Dispatcher at runtime.
					(url, init) => fetch(url, { ...init, dispatcher: dispatcher as never })
				: (url, init) => fetch(url, init));
	}

	/**
	 * Attach the session's token. The transport only ever reads it.
	 */
	bindToken(provider: TokenProvider): void {
		this.tokenProvider = provider;
	}

	url(path: string): string {
		return `${this.endpoint}${path.replace(/^\/+/, "")}`;
	}

	async request(
		method: HttpMethod,
		path: string,
		options: RequestOptions = {},
	): Promise<TransportResponse> {
		const headers = new Headers({ Accept: "application/json" });
		const token = options.authenticated === false ? null : this.tokenProvider();
		if (token) {
			headers.set("Authorization", `Bearer ${token}`);
		}
		const init: RequestInit = { method, headers };
		if (options.body !== undefined) {
			headers.set("Content-Type", "application/json");
			init.body = JSON.stringify(options.body);
		}
		if (options.signal) {
			init.signal = options.signal;
		}

		let exchange: { status: number; ok: boolean; raw: string };
		try {
			exchange = await fetchWithTimeout(
				this.fetchImpl,
				this.url(path),
				init,
				this.timeoutMs,
				async (response) => ({
					status: response.status,
					ok: response.ok,
					raw: await response.text(),
				}),
			);
		} catch (err) {
			this.logger.debug({ method, path, error: formatErrorSafe(err) }, "store request failed");
			// Caller cancellation surfaces as the signal's reason, same as between round trips.
			if (options.signal?.aborted) {
				throw options.signal.reason;
			}
			throw new KvError(
				"transport",
				`${method} ${path} failed: ${describeNetworkFailure(err)}`,
				{ cause: err },
			);
		}

		const { status, ok, raw } = exchange;
		this.logger.debug({ method, path, status }, "store request complete");

		if (raw.trim() === "") {
			return { status, ok, body: null };
		}
		try {
			return { status, ok, body: JSON.parse(raw) };
		} catch (err) {
			if (!ok) {
				// Proxies in front of the store answer errors with HTML or plain text.
				return { status, ok, body: raw };
			}
			throw new KvError("malformed-response", `Failed to parse JSON from ${method} ${path}`, {
				cause: err,
				status,
			});
		}
	}

	async close(): Promise<void> {
		await this.dispatcher?.close();
	}
}

/**
 * Turn a store-level failure into a `store` error and return the body otherwise.
 * The store embeds `errors` in the JSON body; the first message is surfaced.
 */
export function expectOk(response: TransportResponse, action: string): unknown {
	const message = firstErrorMessage(response.body);
	if (message !== null) {
		throw new KvError("store", `Failed to ${action}: ${message}`, { status: response.status });
	}
	if (!response.ok) {
		throw new KvError("store", `Failed to ${action}: HTTP ${response.status}`, {
			status: response.status,
		});
	}
	return response.body;
}
