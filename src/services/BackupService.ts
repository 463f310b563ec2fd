import path from "node:path";
import { BACKUP_SUBFOLDER } from "../constants";
import { ok, type Result } from "../lib/core/result";
import type { FileSystemFailure } from "../lib/errors/types";
import type { FileSystemService } from "./FileSystemService";

/**
 * Copies files into `<runDir>/backup/`, mirroring their path relative to the
 * directory the run operates on. Each file is backed up at most once.
 */
export class BackupService {
	private readonly done = new Set<string>();

	constructor(
		private readonly fs: FileSystemService,
		private readonly runDir: string,
		private readonly root: string,
	) {}

	get backupRoot(): string {
		return path.join(this.runDir, BACKUP_SUBFOLDER);
	}

	/** Destination of `filePath` inside the backup tree. */
	backupPathFor(filePath: string): string {
		const rel = path.relative(this.root, filePath);
		// Files outside the root keep only their name
		const safe =
			rel.startsWith("..") || path.isAbsolute(rel) ? path.basename(filePath) : rel;
		return path.join(this.backupRoot, safe);
	}

	async backup(filePath: string): Promise<Result<void, FileSystemFailure>> {
		if (this.done.has(filePath)) return ok(void 0);
		const res = await this.fs.copyFile(filePath, this.backupPathFor(filePath));
		if (res.ok) this.done.add(filePath);
		return res;
	}
}
