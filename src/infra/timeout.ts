/**
 * Timeout utilities for store requests.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

export type FetchImpl = (url: string, init: RequestInit) => Promise<Response>;

/**
 * fetch() plus a body read, both bounded by one AbortController-based timeout.
 *
 * The timer stays armed until `read` settles, so a server that sends headers
 * and then stalls the body still times out. An external `init.signal` (caller
 * cancellation) is relayed to the request.
 */
export async function fetchWithTimeout<T>(
	fetchImpl: FetchImpl,
	url: string,
	init: RequestInit,
	timeoutMs: number,
	read: (response: Response) => Promise<T>,
): Promise<T> {
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return read(await fetchImpl(url, init));
	}

	const controller = new AbortController();

	let externalAbortCleanup: (() => void) | undefined;
	const externalSignal = init.signal;
	if (externalSignal) {
		if (externalSignal.aborted) {
			controller.abort(externalSignal.reason);
		} else {
			const onAbort = () => controller.abort(externalSignal.reason);
			externalSignal.addEventListener("abort", onAbort, { once: true });
			externalAbortCleanup = () => externalSignal.removeEventListener("abort", onAbort);
		}
	}

	const timer = setTimeout(() => {
		controller.abort(new TimeoutError(`request timed out after ${timeoutMs}ms`, timeoutMs));
	}, timeoutMs);

	// Prevent the timer from keeping the process alive
	timer.unref();

	// Settles on abort even when the fetch implementation or body stream ignores the signal.
	let abortCleanup: (() => void) | undefined;
	const aborted = new Promise<never>((_resolve, reject) => {
		const signal = controller.signal;
		if (signal.aborted) {
			reject(signal.reason);
			return;
		}
		const onAbort = () => reject(signal.reason);
		signal.addEventListener("abort", onAbort, { once: true });
		abortCleanup = () => signal.removeEventListener("abort", onAbort);
	});

	const exchange = (async () => {
		const response = await fetchImpl(url, {
			...init,
			signal: controller.signal,
		});
		return read(response);
	})();

	try {
		return await Promise.race([exchange, aborted]);
	} finally {
		clearTimeout(timer);
		abortCleanup?.();
		externalAbortCleanup?.();
	}
}
