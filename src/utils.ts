import { AdapterUnavailableError, errorMessage } from "./errors";

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason);
			return;
		}
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		const onAbort = (): void => {
			clearTimeout(timer);
			reject(signal?.reason);
		};
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

export type AdapterResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: AdapterUnavailableError };

/**
 * Runs one adapter call with a deadline. The call receives an AbortSignal that
 * fires on timeout; whatever the call does, the result settles by the deadline.
 */
export async function callAdapter<T>(
	adapter: string,
	timeoutMs: number,
	call: (signal: AbortSignal) => Promise<T>
): Promise<AdapterResult<T>> {
	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;

	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const error = new AdapterUnavailableError(adapter, `timed out after ${timeoutMs}ms`);
			controller.abort(error);
			reject(error);
		}, timeoutMs);
	});

	try {
		const value = await Promise.race([call(controller.signal), deadline]);
		return { ok: true, value };
	} catch (err) {
		const error = err instanceof AdapterUnavailableError
			? err
			: new AdapterUnavailableError(adapter, errorMessage(err), { cause: err });
		return { ok: false, error };
	} finally {
		clearTimeout(timer);
	}
}

export function formatDuration(ms: number): string {
	const hours = Math.floor(ms / (1000 * 60 * 60));
	const minutes = Math.floor((ms % (1000 * 60 * 60)) / (1000 * 60));
	if (hours > 0) return `${hours}h ${minutes}m`;
	return `${minutes}m`;
}

export function truncate(text: string, max: number): string {
	return text.length > max ? text.slice(0, max) + "..." : text;
}
