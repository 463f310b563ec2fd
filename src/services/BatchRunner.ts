import path from "node:path";
import { LOG_FILE_NAME } from "../constants";
import { runPool } from "../lib/concurrency/pool";
import { err, isErr, ok, type Result } from "../lib/core/result";
import {
	type AppFailure,
	formatAppFailure,
	formatError,
} from "../lib/errors/types";
import { runStamp } from "../lib/strings/stringUtils";
import type { ToolName, VaultToolsSettings } from "../types";
import { BackupService } from "./BackupService";
import type { FileSystemService } from "./FileSystemService";
import type { LoggingService, ScopedLogger } from "./LoggingService";
import type { BatchTool, FileChange, ToolContext } from "./tools/types";
import type { PromptService } from "./ui/PromptService";

export type RunMode = "dry-run" | "apply" | "cancelled";

export interface RunRequest {
	tool: BatchTool;
	/** Directory the tool operates on, already resolved. */
	root: string;
	settings: VaultToolsSettings;
	/** Write changes instead of reporting them. */
	apply: boolean;
	/** Skip the confirmation prompt. */
	assumeYes: boolean;
	/** Base for a relative `logsFolder`. */
	cwd: string;
	signal?: AbortSignal;
}

export interface RunSummary {
	tool: ToolName;
	mode: RunMode;
	scanned: number;
	planned: number;
	applied: number;
	failed: number;
	/** Files listed as (to be) modified, in order. */
	changes: string[];
	counters: Record<string, number>;
	runDir: string;
}

/**
 * Shared flow for every batch tool: validate the root, discover Markdown
 * files, plan through the tool, then report (dry run) or back up and apply.
 */
export class BatchRunner {
	private readonly SCOPE = "BatchRunner";

	constructor(
		private readonly fs: FileSystemService,
		private readonly logging: LoggingService,
		private readonly prompts: PromptService,
		private readonly clock: () => Date = () => new Date(),
	) {}

	async run(req: RunRequest): Promise<Result<RunSummary, AppFailure>> {
		const access = await this.fs.checkDirectoryAccess(req.root);
		if (isErr(access)) return err(access.error);

		const logsRoot = path.resolve(req.cwd, req.settings.logsFolder);
		const runDir = path.join(
			logsRoot,
			`${req.tool.name}-${runStamp(this.clock())}`,
		);
		if (req.settings.logToFile) {
			await this.logging.attachFile(this.fs, path.join(runDir, LOG_FILE_NAME));
		}

		try {
			return ok(await this.execute(req, logsRoot, runDir));
		} finally {
			await this.logging.detachFile();
		}
	}

	private async execute(
		req: RunRequest,
		logsRoot: string,
		runDir: string,
	): Promise<RunSummary> {
		const log = this.logging.scoped(req.tool.name);
		const summary: RunSummary = {
			tool: req.tool.name,
			mode: req.apply ? "apply" : "dry-run",
			scanned: 0,
			planned: 0,
			applied: 0,
			failed: 0,
			changes: [],
			counters: {},
			runDir,
		};

		log.info(`Processing ${req.root}`);

		// 1. Discover
		const t0 = performance.now();
		const found = await this.fs.findMarkdownFiles(
			req.root,
			req.settings.excludedFolders,
			{
				signal: req.signal,
				// Never walk into our own backups
				shouldEnterDir: (full) => full !== logsRoot,
			},
		);
		for (const failure of found.failures) {
			log.error(formatAppFailure(failure));
		}
		summary.scanned = found.files.length;
		summary.failed += found.failures.length;
		this.logging.debug(
			this.SCOPE,
			`Discovered ${found.files.length} files in ${(performance.now() - t0).toFixed(1)}ms`,
		);

		// 2. Plan
		const ctx: ToolContext = {
			root: req.root,
			settings: req.settings,
			fs: this.fs,
			log,
			prompts: this.prompts,
			applying: req.apply,
			signal: req.signal,
		};
		const plan = await req.tool.plan(found.files, ctx);
		summary.planned = plan.changes.length;
		summary.failed += plan.failed;
		summary.counters = plan.counters ?? {};
		summary.changes = plan.changes.map((c) => this.describe(req.root, c));

		// 3. Report or apply
		if (plan.changes.length === 0) {
			log.info("No files to modify.");
		} else if (!req.apply) {
			log.info("Dry run complete. The following files would be modified:");
			for (const line of summary.changes) log.info(`  ${line}`);
		} else {
			const decision = req.assumeYes
				? "confirm"
				: await this.prompts.confirm(
						`About to modify ${plan.changes.length} files. Are you sure?`,
					);
			if (decision === "cancel") {
				log.info("Operation cancelled.");
				summary.mode = "cancelled";
			} else {
				const backups = new BackupService(this.fs, runDir, req.root);
				await this.applyChanges(plan.changes, backups, req, log, summary);
			}
		}

		this.logSummary(log, summary);
		return summary;
	}

	private async applyChanges(
		changes: FileChange[],
		backups: BackupService,
		req: RunRequest,
		log: ScopedLogger,
		summary: RunSummary,
	): Promise<void> {
		const results = await runPool(
			changes,
			req.settings.concurrency,
			async (change): Promise<Result<void, AppFailure>> => {
				for (const filePath of change.backup) {
					const saved = await backups.backup(filePath);
					// Never touch a file whose backup failed
					if (isErr(saved)) return saved;
				}
				return change.apply();
			},
			req.signal,
		);

		for (const res of results) {
			if (isErr(res)) {
				summary.failed++;
				log.error(`${res.error.item.filePath}: ${formatError(res.error.error)}`);
			} else if (isErr(res.value)) {
				summary.failed++;
				log.error(formatAppFailure(res.value.error));
			} else {
				summary.applied++;
			}
		}
		if (summary.applied > 0) {
			log.info(`Backups written to ${backups.backupRoot}`);
		}
	}

	private describe(root: string, change: FileChange): string {
		const rel = path.relative(root, change.filePath);
		return change.action ? `${rel} (${change.action})` : rel;
	}

	private logSummary(log: ScopedLogger, s: RunSummary): void {
		const extra = Object.entries(s.counters)
			.map(([name, n]) => `, ${name}: ${n}`)
			.join("");
		log.info(
			`Summary: scanned ${s.scanned}, planned ${s.planned}, applied ${s.applied}, failed ${s.failed}${extra} (${s.mode})`,
		);
	}
}
