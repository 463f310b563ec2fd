import { getFsCode } from "../errors/mapper";
import { abortError, sleep } from "./cancellation";

export type Jitter = "none" | "full";

export interface RetryOptions {
	/** Maximum number of attempts; default is 5 */
	maxAttempts?: number;
	/** Base delay in milliseconds; default is 50ms */
	baseDelayMs?: number;
	/** Maximum delay in milliseconds; default is 1000ms */
	maxDelayMs?: number;
	/** Exponential factor; default is 2 */
	factor?: number;
	/** Jitter strategy: "full" by default; boolean true maps to "full" */
	jitter?: Jitter | boolean;
	/** Returns true if the error is transient and another attempt should follow. */
	shouldRetry?: (error: unknown, attempt: number) => boolean;
	/** Aborts between attempts and cancels the back-off sleep */
	signal?: AbortSignal;
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Transient FS error codes. EPERM/EACCES/EBUSY show up on Windows while an
 * editor or sync client holds the file; the rest are resource exhaustion.
 * ENOENT is NOT transient here: a missing note stays missing.
 */
const TRANSIENT = new Set([
	"EPERM",
	"EACCES",
	"EBUSY",
	"ETXTBSY",
	"EAGAIN",
	"EMFILE",
	"ENFILE",
	"EIO",
	"UNKNOWN",
]);

export function isTransientFsError(e: unknown): boolean {
	const code = getFsCode(e);
	return code !== undefined && TRANSIENT.has(code);
}

export const FS_RETRY_DEFAULTS: RetryOptions = {
	maxAttempts: 4,
	baseDelayMs: 40,
	factor: 2,
	jitter: true,
};

export async function withFsRetry<T>(
	fn: () => Promise<T>,
	opts?: RetryOptions,
): Promise<T> {
	return retry(fn, {
		...FS_RETRY_DEFAULTS,
		...opts,
		shouldRetry: (err: unknown, attempt: number) => {
			const user = opts?.shouldRetry?.(err, attempt);
			if (user !== undefined) return user;
			return isTransientFsError(err);
		},
	});
}

function computeDelay(
	attempt: number,
	cfg: Required<
		Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "factor" | "jitter">
	>,
): number {
	const { baseDelayMs, maxDelayMs, factor } = cfg;
	const delay = Math.min(maxDelayMs, baseDelayMs * factor ** (attempt - 1));
	const j =
		cfg.jitter === true ? "full" : cfg.jitter === false ? "none" : cfg.jitter;
	return j === "full" ? Math.floor(Math.random() * delay) : delay;
}

/**
 * Retries the async function `fn` using exponential back-off.
 * @throws The last error from `fn` if all attempts fail.
 */
export async function retry<T>(
	fn: () => Promise<T>,
	opts?: RetryOptions,
): Promise<T> {
	const {
		maxAttempts = 5,
		baseDelayMs = 50,
		maxDelayMs = 1000,
		factor = 2,
		jitter = "full",
		shouldRetry = () => true,
		signal,
		onRetry,
	} = opts ?? {};

	if (maxAttempts < 1) throw new Error("maxAttempts must be >= 1");
	if (baseDelayMs < 0 || maxDelayMs < 0) throw new Error("Delays must be >= 0");
	if (factor < 1) throw new Error("factor must be >= 1");

	let attempt = 0;
	while (true) {
		if (signal?.aborted) throw abortError();
		try {
			return await fn();
		} catch (err) {
			attempt++;
			let shouldAttemptRetry = false;
			if (attempt < maxAttempts) {
				try {
					shouldAttemptRetry = shouldRetry(err, attempt);
				} catch {
					// Predicate threw: rethrow the original error below
					shouldAttemptRetry = false;
				}
			}
			if (!shouldAttemptRetry) {
				throw err;
			}
			const delay = computeDelay(attempt, {
				baseDelayMs,
				maxDelayMs,
				factor,
				jitter,
			});
			onRetry?.(err, attempt, delay);
			await sleep(delay, signal);
		}
	}
}
