import { Mutex } from "src/lib/concurrency/mutex";
import { runPool } from "src/lib/concurrency/pool";
import { isTransientFsError, retry, withFsRetry } from "src/lib/concurrency/retry";
import { isAbortError } from "src/lib/concurrency/cancellation";

const fsError = (code: string) => Object.assign(new Error(code), { code });

describe("runPool", () => {
	it("returns one result per item in input order, isolating failures", async () => {
		const results = await runPool([1, 2, 3], 2, async (n) => {
			if (n === 2) throw new Error("boom");
			return n * 10;
		});
		expect(results.map((r) => (r.ok ? r.value : `failed ${r.error.item}`))).toEqual([
			10,
			"failed 2",
			30,
		]);
	});

	it("never runs more tasks than the limit", async () => {
		let active = 0;
		let peak = 0;
		await runPool([1, 2, 3, 4, 5], 2, async () => {
			active++;
			peak = Math.max(peak, active);
			await new Promise((resolve) => setTimeout(resolve, 5));
			active--;
		});
		expect(peak).toBe(2);
	});

	it("rejects with an abort error when the signal is already aborted", async () => {
		const controller = new AbortController();
		controller.abort();
		const error = await runPool([1], 1, async (n) => n, controller.signal).catch(
			(e: unknown) => e,
		);
		expect(isAbortError(error)).toBe(true);
	});
});

describe("Mutex", () => {
	it("runs callers one at a time, in order", async () => {
		const mutex = new Mutex();
		const order: string[] = [];
		const task = (name: string, ms: number) =>
			mutex.lock(async () => {
				order.push(`start ${name}`);
				await new Promise((resolve) => setTimeout(resolve, ms));
				order.push(`end ${name}`);
			});

		await Promise.all([task("a", 10), task("b", 0)]);
		expect(order).toEqual(["start a", "end a", "start b", "end b"]);
	});

	it("releases the lock when the callback throws", async () => {
		const mutex = new Mutex();
		await expect(mutex.lock(async () => Promise.reject(new Error("x")))).rejects.toThrow("x");
		await expect(mutex.lock(async () => "next")).resolves.toBe("next");
	});
});

describe("retry", () => {
	it("retries transient filesystem errors", async () => {
		const fn = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(fsError("EBUSY"))
			.mockRejectedValueOnce(fsError("EMFILE"))
			.mockResolvedValue("done");
		await expect(withFsRetry(fn, { baseDelayMs: 0, jitter: "none" })).resolves.toBe("done");
		expect(fn).toHaveBeenCalledTimes(3);
	});

	it("does not retry a missing file", async () => {
		const fn = vi.fn<() => Promise<string>>().mockRejectedValue(fsError("ENOENT"));
		await expect(withFsRetry(fn, { baseDelayMs: 0 })).rejects.toThrow("ENOENT");
		expect(fn).toHaveBeenCalledTimes(1);
		expect(isTransientFsError(fsError("ENOENT"))).toBe(false);
	});

	it("gives up after maxAttempts", async () => {
		const fn = vi.fn<() => Promise<void>>().mockRejectedValue(new Error("always"));
		await expect(retry(fn, { maxAttempts: 3, baseDelayMs: 0 })).rejects.toThrow("always");
		expect(fn).toHaveBeenCalledTimes(3);
	});
});
