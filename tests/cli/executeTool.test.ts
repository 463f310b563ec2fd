import { promises as fsp } from "node:fs";
import path from "node:path";
import { type CliDeps, executeTool } from "src/cli/executeTool";
import { createProgram } from "src/cli/program";
import { FileSystemService } from "src/services/FileSystemService";
import { DedupTool } from "src/services/tools/DedupTool";
import { StripFrontmatterTool } from "src/services/tools/StripFrontmatterTool";
import { UnclobberTool } from "src/services/tools/UnclobberTool";
import { PromptService } from "src/services/ui/PromptService";
import type { Mock } from "vitest";
import { createTempDir, type TempDir } from "../helpers/tempDir";

type Log = Mock<(message: string) => void>;

const CLOBBERED = "---\na: 1\n---\na: 2\nb: 3\n---\nBody text\n";
const RUN_DIR = path.join("logs", "unclobber-20240102-030405");

describe("executeTool", () => {
	let tmp: TempDir;
	let vault: string;
	let out: { log: Log; warn: Log; error: Log };
	let ask: Mock<(question: string) => Promise<string>>;

	const deps = (env: NodeJS.ProcessEnv = { VAULT_PATH: vault }): CliDeps => ({
		cwd: tmp.root,
		env,
		fs: new FileSystemService(),
		prompts: new PromptService(ask),
		console: out,
		clock: () => new Date(2024, 0, 2, 3, 4, 5),
	});

	const logged = (pattern: RegExp) =>
		out.log.mock.calls.some(([line]) => pattern.test(line));

	beforeEach(async () => {
		tmp = await createTempDir();
		vault = path.join(tmp.root, "vault");
		await tmp.write("vault/a.md", CLOBBERED);
		await tmp.write("vault/b.md", "---\nx: 1\n---\nBody\n");
		const fn = () => vi.fn<(message: string) => void>();
		out = { log: fn(), warn: fn(), error: fn() };
		ask = vi.fn<(question: string) => Promise<string>>();
	});
	afterEach(async () => {
		await tmp.cleanup();
	});

	describe("unclobber", () => {
		it("reports without writing on a dry run", async () => {
			const { exitCode, summary } = await executeTool(
				{ tool: new UnclobberTool(), options: {} },
				deps(),
			);

			expect(exitCode).toBe(0);
			expect(summary).toMatchObject({
				mode: "dry-run",
				scanned: 2,
				planned: 1,
				applied: 0,
				changes: ["a.md"],
			});
			expect(await tmp.read("vault/a.md")).toBe(CLOBBERED);
			expect(await tmp.exists(path.join(RUN_DIR, "out.log"))).toBe(true);
			expect(
				logged(/\[unclobber\] Summary: scanned 2, planned 1, applied 0, failed 0 \(dry-run\)$/),
			).toBe(true);
			expect(ask).not.toHaveBeenCalled();
		});

		it("backs up and rewrites with --go --yes", async () => {
			const { exitCode, summary } = await executeTool(
				{ tool: new UnclobberTool(), options: { go: true, yes: true } },
				deps(),
			);

			expect(exitCode).toBe(0);
			expect(summary?.applied).toBe(1);
			expect(await tmp.read("vault/a.md")).toBe("---\na: 2\nb: 3\n---\n\nBody text\n");
			expect(await tmp.read(path.join(RUN_DIR, "backup", "a.md"))).toBe(CLOBBERED);
		});

		it("stops when the confirmation is declined", async () => {
			ask.mockResolvedValueOnce("n");
			const { exitCode, summary } = await executeTool(
				{ tool: new UnclobberTool(), options: { go: true } },
				deps(),
			);

			expect(exitCode).toBe(0);
			expect(summary?.mode).toBe("cancelled");
			expect(ask).toHaveBeenCalledWith("About to modify 1 files. Are you sure? [N/y] ");
			expect(await tmp.read("vault/a.md")).toBe(CLOBBERED);
		});

		it("asks about conflicts before confirming in interactive mode", async () => {
			ask.mockResolvedValueOnce("1").mockResolvedValueOnce("y");
			const { exitCode } = await executeTool(
				{
					tool: new UnclobberTool(),
					options: { go: true },
					overrides: { conflictMode: "interactive" },
				},
				deps(),
			);

			expect(exitCode).toBe(0);
			expect(ask).toHaveBeenCalledTimes(2);
			expect(ask.mock.calls[0]?.[0]).toMatch(/^Conflict in .*a\.md for key 'a':/);
			expect(await tmp.read("vault/a.md")).toBe("---\na: 1\nb: 3\n---\n\nBody text\n");
		});

		it("fails without a vault path", async () => {
			const { exitCode, summary } = await executeTool(
				{ tool: new UnclobberTool(), options: {} },
				deps({}),
			);
			expect(exitCode).toBe(1);
			expect(summary).toBeNull();
			expect(out.error).toHaveBeenCalledWith(
				expect.stringMatching(/\[cli\] Missing required setting: vaultPath$/),
			);
		});

		it("never scans its own logs folder", async () => {
			const inVault = { VAULT_PATH: tmp.root };
			await executeTool(
				{ tool: new UnclobberTool(), options: { go: true, yes: true } },
				deps(inVault),
			);
			const second = await executeTool(
				{ tool: new UnclobberTool(), options: {} },
				deps(inVault),
			);
			expect(second.summary).toMatchObject({ scanned: 2, planned: 0 });
		});

		it("skips undecodable files without failing", async () => {
			await tmp.write("vault/bad.md", new Uint8Array([0xff, 0xfe, 0x0a]));
			const { exitCode, summary } = await executeTool(
				{ tool: new UnclobberTool(), options: { logFile: false } },
				deps(),
			);
			expect(exitCode).toBe(0);
			expect(summary).toMatchObject({
				scanned: 3,
				planned: 1,
				failed: 0,
				counters: { undecodable: 1 },
			});
			expect(await tmp.exists("logs")).toBe(false);
		});
	});

	it("strips leading frontmatter", async () => {
		await tmp.write("cards/q.md", "---\ntags: x\n---\nQ?\n");
		await tmp.write("cards/plain.md", "Just text\n");
		const { summary } = await executeTool(
			{
				tool: new StripFrontmatterTool(),
				directory: path.join(tmp.root, "cards"),
				options: { go: true, yes: true },
			},
			deps(),
		);

		expect(summary).toMatchObject({
			planned: 1,
			applied: 1,
			counters: { "without frontmatter": 1 },
		});
		expect(await tmp.read("cards/q.md")).toBe("Q?\n");
		expect(await tmp.read("cards/plain.md")).toBe("Just text\n");
	});

	it("deletes duplicates and renames a numbered survivor", async () => {
		await tmp.write("d/note.md", "---\nid: 1\n---\nSame body\n");
		await tmp.write("d/note (1).md", "---\nid: 2\n---\nSame body\n");
		await tmp.write("d/x (1).md", "Other\n");
		await tmp.write("d/x (2).md", "Other\n");
		await tmp.write("d/solo.md", "Unique\n");

		const { exitCode, summary } = await executeTool(
			{
				tool: new DedupTool(),
				directory: path.join(tmp.root, "d"),
				options: { go: true, yes: true },
			},
			deps(),
		);

		expect(exitCode).toBe(0);
		expect(summary).toMatchObject({
			changes: ["note (1).md (delete)", "x (2).md (delete)", "x (1).md (rename to x.md)"],
			applied: 3,
			counters: { "duplicate groups": 2, deletions: 2, renames: 1 },
		});
		expect((await fsp.readdir(path.join(tmp.root, "d"))).sort()).toEqual([
			"note.md",
			"solo.md",
			"x.md",
		]);
	});

	it("runs dataview-limits through the command line", async () => {
		await tmp.write("vault/q.md", "```dataview\nLIST\n```\n");
		const program = createProgram(deps());
		await program.parseAsync(
			["dataview-limits", "--vault-path", vault, "--go", "-y", "--no-log-file", "-l", "5"],
			{ from: "user" },
		);

		expect(process.exitCode).toBeUndefined();
		expect(await tmp.read("vault/q.md")).toBe("```dataview\nLIST\nLIMIT 5\n```\n");
		expect(await tmp.exists(path.join("logs", "dataview-limits-20240102-030405", "out.log"))).toBe(
			false,
		);
	});
});
