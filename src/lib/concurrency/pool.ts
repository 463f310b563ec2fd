import pLimit from "p-limit";
import { err, ok, type Result } from "../core/result";
import { isAbortError, throwIfAborted } from "./cancellation";

export interface PoolFailure<T> {
	item: T;
	error: unknown;
}

/**
 * Headless concurrency pool. Runs `task` for each item with a concurrency
 * limit and collects one Result per item, in input order. A failing item
 * never stops the others; an abort stops scheduling and rejects the pool.
 */
export async function runPool<T, R>(
	items: readonly T[],
	maxConcurrent: number,
	task: (item: T) => Promise<R>,
	signal?: AbortSignal,
): Promise<Result<R, PoolFailure<T>>[]> {
	if (maxConcurrent <= 0) {
		throw new Error("maxConcurrent must be >= 1");
	}
	throwIfAborted(signal);

	const limit = pLimit(maxConcurrent);
	const tasks = items.map((item) =>
		limit(async (): Promise<Result<R, PoolFailure<T>>> => {
			throwIfAborted(signal);
			try {
				return ok(await task(item));
			} catch (error) {
				if (isAbortError(error)) throw error;
				return err({ item, error });
			}
		}),
	);
	return Promise.all(tasks);
}
