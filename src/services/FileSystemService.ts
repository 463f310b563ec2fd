import { constants as fsConstants, promises as fsp } from "node:fs";
import type { Dirent, Stats } from "node:fs";
import path from "node:path";
import { MARKDOWN_EXTENSION } from "../constants";
import { withFsRetry } from "../lib/concurrency/retry";
import { err, isErr, ok, type Result } from "../lib/core/result";
import { toFailure } from "../lib/errors/mapper";
import type { FileSystemFailure } from "../lib/errors/types";

export interface DecodedText {
	text: string;
	/** True when invalid UTF-8 sequences were replaced with U+FFFD. */
	lossy: boolean;
}

export interface WalkOptions {
	signal?: AbortSignal;
	/** Return false to prune a directory from the walk. */
	shouldEnterDir?: (fullPath: string, dirName: string) => boolean;
}

const strictDecoder = new TextDecoder("utf-8", { fatal: true });
const lossyDecoder = new TextDecoder("utf-8");

export class FileSystemService {
	/* ------------------------------------------------------------------ */
	/*                               READS                                */
	/* ------------------------------------------------------------------ */

	public async exists(filePath: string): Promise<boolean> {
		try {
			await withFsRetry(() => fsp.access(filePath));
			return true;
		} catch (error: unknown) {
			const failure = toFailure(error, filePath);
			if (failure.kind === "NotFound") return false;
			throw error;
		}
	}

	/** Reads a file as strict UTF-8; invalid bytes yield `DecodeFailed`. */
	public async readText(
		filePath: string,
	): Promise<Result<string, FileSystemFailure>> {
		const bytes = await this.readBinary(filePath);
		if (isErr(bytes)) return bytes;
		try {
			return ok(strictDecoder.decode(bytes.value));
		} catch {
			return err({ kind: "DecodeFailed", path: filePath });
		}
	}

	/** Reads a file as UTF-8, replacing invalid sequences instead of failing. */
	public async readTextLossy(
		filePath: string,
	): Promise<Result<DecodedText, FileSystemFailure>> {
		const bytes = await this.readBinary(filePath);
		if (isErr(bytes)) return bytes;
		try {
			return ok({ text: strictDecoder.decode(bytes.value), lossy: false });
		} catch {
			return ok({ text: lossyDecoder.decode(bytes.value), lossy: true });
		}
	}

	public async readBinary(
		filePath: string,
	): Promise<Result<Uint8Array, FileSystemFailure>> {
		try {
			const data = await withFsRetry(() => fsp.readFile(filePath));
			return ok(data);
		} catch (error: unknown) {
			return err(toFailure(error, filePath, "ReadFailed"));
		}
	}

	public async stat(
		filePath: string,
	): Promise<Result<Stats, FileSystemFailure>> {
		try {
			return ok(await withFsRetry(() => fsp.stat(filePath)));
		} catch (error: unknown) {
			return err(toFailure(error, filePath, "ReadFailed"));
		}
	}

	/**
	 * Verifies that `dirPath` is an existing directory this process can both
	 * read and write.
	 */
	public async checkDirectoryAccess(
		dirPath: string,
	): Promise<Result<void, FileSystemFailure>> {
		const stats = await this.stat(dirPath);
		if (isErr(stats)) return stats;
		if (!stats.value.isDirectory()) {
			return err({ kind: "NotADirectory", path: dirPath });
		}
		try {
			await fsp.access(dirPath, fsConstants.R_OK | fsConstants.W_OK);
			return ok(void 0);
		} catch (error: unknown) {
			return err(toFailure(error, dirPath, "ReadFailed"));
		}
	}

	/* ------------------------------------------------------------------ */
	/*                               WRITES                               */
	/* ------------------------------------------------------------------ */

	public async ensureDir(
		dirPath: string,
	): Promise<Result<void, FileSystemFailure>> {
		try {
			await withFsRetry(() => fsp.mkdir(dirPath, { recursive: true }));
			return ok(void 0);
		} catch (error: unknown) {
			return err(toFailure(error, dirPath, "WriteFailed"));
		}
	}

	public async writeText(
		filePath: string,
		data: string,
	): Promise<Result<void, FileSystemFailure>> {
		try {
			await withFsRetry(async () => {
				await fsp.mkdir(path.dirname(filePath), { recursive: true });
				await fsp.writeFile(filePath, data, "utf8");
			});
			return ok(void 0);
		} catch (error: unknown) {
			return err(toFailure(error, filePath, "WriteFailed"));
		}
	}

	public async appendText(
		filePath: string,
		data: string,
	): Promise<Result<void, FileSystemFailure>> {
		try {
			await withFsRetry(() => fsp.appendFile(filePath, data, "utf8"));
			return ok(void 0);
		} catch (error: unknown) {
			return err(toFailure(error, filePath, "WriteFailed"));
		}
	}

	/** Copies a file, creating the destination's parent directories. */
	public async copyFile(
		src: string,
		dst: string,
	): Promise<Result<void, FileSystemFailure>> {
		try {
			await withFsRetry(async () => {
				await fsp.mkdir(path.dirname(dst), { recursive: true });
				await fsp.copyFile(src, dst);
			});
			return ok(void 0);
		} catch (error: unknown) {
			return err(toFailure(error, src, "WriteFailed"));
		}
	}

	/** Renames without replacing: an existing destination is `AlreadyExists`. */
	public async rename(
		src: string,
		dst: string,
	): Promise<Result<void, FileSystemFailure>> {
		if (await this.exists(dst)) {
			return err({ kind: "AlreadyExists", path: dst });
		}
		try {
			await withFsRetry(() => fsp.rename(src, dst));
			return ok(void 0);
		} catch (error: unknown) {
			return err(toFailure(error, src, "WriteFailed"));
		}
	}

	public async remove(
		filePath: string,
	): Promise<Result<void, FileSystemFailure>> {
		try {
			await withFsRetry(() => fsp.unlink(filePath));
			return ok(void 0);
		} catch (error: unknown) {
			return err(toFailure(error, filePath, "WriteFailed"));
		}
	}

	/* ------------------------------------------------------------------ */
	/*                              TRAVERSAL                             */
	/* ------------------------------------------------------------------ */

	public async *iterateDirectory(
		dirPath: string,
		opts?: WalkOptions,
	): AsyncIterable<Result<{ path: string; dirent: Dirent }, FileSystemFailure>> {
		const signal = opts?.signal;
		const stack: string[] = [dirPath];
		let yielded = 0;

		while (stack.length > 0) {
			if (signal?.aborted) return;

			const current = stack.pop();
			if (current === undefined) return;
			try {
				// for-await closes the handle on completion, early return or error
				const dir = await fsp.opendir(current);
				for await (const dirent of dir) {
					if (signal?.aborted) return;
					const full = path.join(current, dirent.name);
					yield ok({ path: full, dirent });

					if (
						dirent.isDirectory() &&
						(!opts?.shouldEnterDir || opts.shouldEnterDir(full, dirent.name))
					) {
						stack.push(full);
					}

					if (++yielded % 500 === 0) await Promise.resolve(); // Yield
				}
			} catch (error) {
				yield err(toFailure(error, current, "ReadFailed"));
			}
		}
	}

	/**
	 * Collects every Markdown file under `root`, skipping directories whose
	 * name is in `excludedFolders`. Paths are absolute and sorted.
	 */
	public async findMarkdownFiles(
		root: string,
		excludedFolders: readonly string[],
		opts?: WalkOptions,
	): Promise<{ files: string[]; failures: FileSystemFailure[] }> {
		const excluded = new Set(excludedFolders);
		const files: string[] = [];
		const failures: FileSystemFailure[] = [];

		for await (const entry of this.iterateDirectory(path.resolve(root), {
			signal: opts?.signal,
			shouldEnterDir: (full, name) =>
				!excluded.has(name) && (opts?.shouldEnterDir?.(full, name) ?? true),
		})) {
			if (isErr(entry)) {
				failures.push(entry.error);
				continue;
			}
			const { path: full, dirent } = entry.value;
			if (
				dirent.isFile() &&
				full.toLowerCase().endsWith(MARKDOWN_EXTENSION)
			) {
				files.push(full);
			}
		}

		files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
		return { files, failures };
	}
}
