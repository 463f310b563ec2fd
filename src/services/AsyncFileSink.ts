import path from "node:path";
import { debounce, type DebouncedFunction } from "../lib/core/debounce";
import { isErr } from "../lib/core/result";
import { formatAppFailure } from "../lib/errors/types";
import type { FileSystemService } from "./FileSystemService";

/**
 * Buffered append-only log file. Lines are batched and written on a
 * debounce; the first write failure disables the sink and is reported once
 * through `onFailure`.
 */
export class AsyncFileSink {
	private buf: string[] = [];
	private dropped = 0;
	private disabled = false;
	private dirReady = false;

	private readonly maxBufferLines = 2000; // cap memory

	private flushInFlight: Promise<void> | null = null;
	private readonly flushDebounced: DebouncedFunction<[]>;

	constructor(
		private readonly fs: FileSystemService,
		readonly filePath: string,
		private readonly onFailure: (message: string) => void,
		flushDelayMs = 800,
	) {
		this.flushDebounced = debounce(() => {
			this.flushNow().catch((e: unknown) => this.fail(String(e)));
		}, flushDelayMs);
	}

	// Dumb sink: append pre-formatted line with buffering and debounce
	public append(line: string): void {
		if (this.disabled) return;
		this.buf.push(line);
		if (this.buf.length > this.maxBufferLines) {
			const overflow = this.buf.length - this.maxBufferLines;
			this.buf = this.buf.slice(-this.maxBufferLines);
			this.dropped += overflow;
		}
		this.flushDebounced();
	}

	public async flush(): Promise<void> {
		await this.flushNow();
	}

	async dispose(): Promise<void> {
		this.flushDebounced.cancel();
		await this.flushNow();
	}

	private fail(message: string): void {
		if (this.disabled) return;
		this.disabled = true;
		this.buf = [];
		this.onFailure(message);
	}

	private async flushNow(): Promise<void> {
		// Serialize flushes
		while (this.flushInFlight) {
			await this.flushInFlight;
		}
		if (this.buf.length === 0 || this.disabled) return;

		// Snapshot current buffer and reset
		const droppedNote =
			this.dropped > 0
				? `… dropped ${this.dropped} log line(s) due to buffer limit\n`
				: "";
		const toWrite = `${this.buf.join("\n")}\n${droppedNote}`;
		this.buf = [];
		this.dropped = 0;

		this.flushInFlight = this.write(toWrite).finally(() => {
			this.flushInFlight = null;
		});
		await this.flushInFlight;
	}

	private async write(text: string): Promise<void> {
		if (!this.dirReady) {
			const made = await this.fs.ensureDir(path.dirname(this.filePath));
			if (isErr(made)) {
				this.fail(formatAppFailure(made.error));
				return;
			}
			this.dirReady = true;
		}
		const res = await this.fs.appendText(this.filePath, text);
		if (isErr(res)) this.fail(formatAppFailure(res.error));
	}
}
