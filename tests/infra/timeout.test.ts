import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchWithTimeout, TimeoutError } from "../../src/infra/timeout.js";

const readText = (response: Response) => response.text();

describe("infra/timeout", () => {
	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	it("fetchWithTimeout passes through when timeout is disabled", async () => {
		const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response("ok"));

		const result = await fetchWithTimeout(fetchMock, "https://example.test", { method: "POST" }, 0, readText);
		expect(result).toBe("ok");
		expect(fetchMock).toHaveBeenCalledWith("https://example.test", { method: "POST" });
	});

	it("fetchWithTimeout aborts underlying fetch on timeout", async () => {
		vi.useFakeTimers();

		let capturedSignal: AbortSignal | undefined;
		const fetchMock = vi.fn(
			(_url: string, init: RequestInit) =>
				new Promise<Response>((_resolve, reject) => {
					capturedSignal = init.signal ?? undefined;
					capturedSignal?.addEventListener("abort", () => reject(capturedSignal?.reason), {
						once: true,
					});
				}),
		);

		const promise = fetchWithTimeout(fetchMock, "https://example.test", {}, 25, readText);

		// Attach catch handler BEFORE advancing timers to prevent unhandled rejection
		const result = promise.catch((err: unknown) => err);
		await vi.advanceTimersByTimeAsync(25);

		const err = await result;
		expect(err).toBeInstanceOf(TimeoutError);
		expect(err).toMatchObject({ message: "request timed out after 25ms", timeoutMs: 25 });
		expect(capturedSignal?.aborted).toBe(true);
	});

	it("fetchWithTimeout times out while the body is still streaming", async () => {
		vi.useFakeTimers();

		// Headers arrive at once; the body sends a fragment and then never finishes.
		const stalled = new ReadableStream<Uint8Array>({
			start(controller) {
				controller.enqueue(new TextEncoder().encode('{"data":'));
			},
		});
		const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response(stalled));

		const result = fetchWithTimeout(fetchMock, "https://example.test", {}, 25, readText).catch(
			(err: unknown) => err,
		);
		await vi.advanceTimersByTimeAsync(25);

		expect(await result).toBeInstanceOf(TimeoutError);
	});

	it("fetchWithTimeout relays external abort signal", async () => {
		const external = new AbortController();

		const fetchMock = vi.fn(
			(_url: string, init: RequestInit) =>
				new Promise<Response>((_resolve, reject) => {
					const signal = init.signal;
					signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
				}),
		);

		const promise = fetchWithTimeout(
			fetchMock,
			"https://example.test",
			{ signal: external.signal },
			5000,
			readText,
		);
		external.abort(new Error("upstream-abort"));

		await expect(promise).rejects.toMatchObject({ message: "upstream-abort" });
	});

	it("fetchWithTimeout rejects at once when the external signal is already aborted", async () => {
		const external = new AbortController();
		external.abort(new Error("already-aborted"));
		let seen: AbortSignal | null | undefined;
		const fetchMock = vi.fn(async (_url: string, init: RequestInit) => {
			seen = init.signal;
			return new Response("ok");
		});

		await expect(
			fetchWithTimeout(fetchMock, "https://example.test", { signal: external.signal }, 5000, readText),
		).rejects.toMatchObject({ message: "already-aborted" });
		expect(seen?.aborted).toBe(true);
	});
});
