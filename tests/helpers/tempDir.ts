import { promises as fsp } from "node:fs";
import os from "node:os";
import path from "node:path";

/** Creates a scratch directory and returns helpers bound to it. */
export async function createTempDir() {
	const root = await fsp.mkdtemp(path.join(os.tmpdir(), "vault-tools-"));

	const write = async (rel: string, content: string | Uint8Array) => {
		const full = path.join(root, rel);
		await fsp.mkdir(path.dirname(full), { recursive: true });
		await fsp.writeFile(full, content);
		return full;
	};

	const read = (rel: string) => fsp.readFile(path.join(root, rel), "utf8");

	const exists = async (rel: string) => {
		try {
			await fsp.access(path.join(root, rel));
			return true;
		} catch {
			return false;
		}
	};

	const cleanup = () => fsp.rm(root, { recursive: true, force: true });

	return { root, write, read, exists, cleanup };
}

export type TempDir = Awaited<ReturnType<typeof createTempDir>>;
