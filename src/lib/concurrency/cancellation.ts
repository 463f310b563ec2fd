// Cancellation utilities: abort errors and abortable sleep

export function abortError(message = "Operation cancelled by user"): Error {
	const error = new Error(message);
	error.name = "AbortError";
	return error;
}

export function isAbortError(error: unknown): boolean {
	return error instanceof Error && error.name === "AbortError";
}

export function throwIfAborted(signal?: AbortSignal): void {
	if (!signal?.aborted) return;
	// Normalize to a consistent AbortError message
	throw abortError("Aborted by user");
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortError());
			return;
		}

		const onAbort = () => {
			clearTimeout(id);
			reject(abortError());
		};
		const id = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
