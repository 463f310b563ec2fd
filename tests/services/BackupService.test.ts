import path from "node:path";
import { BackupService } from "src/services/BackupService";
import { FileSystemService } from "src/services/FileSystemService";
import { createTempDir, type TempDir } from "../helpers/tempDir";

describe("BackupService", () => {
	const fs = new FileSystemService();
	let tmp: TempDir;

	beforeEach(async () => {
		tmp = await createTempDir();
	});
	afterEach(async () => {
		await tmp.cleanup();
	});

	it("mirrors the path relative to the root", () => {
		const backups = new BackupService(fs, "/logs/run", "/vault");
		expect(backups.backupPathFor("/vault/a/b.md")).toBe(
			path.join("/logs/run", "backup", "a", "b.md"),
		);
		expect(backups.backupPathFor("/elsewhere/c.md")).toBe(
			path.join("/logs/run", "backup", "c.md"),
		);
	});

	it("copies the original once, even if the file changes later", async () => {
		const file = await tmp.write("vault/sub/n.md", "original");
		const backups = new BackupService(
			fs,
			path.join(tmp.root, "run"),
			path.join(tmp.root, "vault"),
		);

		expect((await backups.backup(file)).ok).toBe(true);
		await tmp.write("vault/sub/n.md", "changed");
		expect((await backups.backup(file)).ok).toBe(true);

		expect(await tmp.read("run/backup/sub/n.md")).toBe("original");
	});

	it("reports a missing source", async () => {
		const backups = new BackupService(fs, path.join(tmp.root, "run"), tmp.root);
		const result = await backups.backup(path.join(tmp.root, "gone.md"));
		expect(result.ok).toBe(false);
	});
});
