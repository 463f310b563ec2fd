import { loadSettings, resolveTargetDirectory } from "../core/settingsLoader";
import { isErr } from "../lib/core/result";
import { formatAppFailure } from "../lib/errors/types";
import { BatchRunner, type RunSummary } from "../services/BatchRunner";
import type { FileSystemService } from "../services/FileSystemService";
import {
	type ConsoleLike,
	LoggingService,
	LogLevel,
} from "../services/LoggingService";
import type { BatchTool } from "../services/tools/types";
import type { PromptService } from "../services/ui/PromptService";

export interface SharedCliOptions {
	go?: boolean;
	yes?: boolean;
	config?: string;
	logLevel?: number;
	/** False when `--no-log-file` is given. */
	logFile?: boolean;
	concurrency?: number;
}

export interface CliDeps {
	cwd: string;
	env: NodeJS.ProcessEnv;
	fs: FileSystemService;
	prompts: PromptService;
	console?: ConsoleLike;
	signal?: AbortSignal;
	clock?: () => Date;
}

export interface ToolInvocation {
	tool: BatchTool;
	/** Positional directory, or `--vault-path` for dataview-limits. */
	directory?: string;
	options: SharedCliOptions;
	/** Tool-specific setting overrides, e.g. `datePolicy`. */
	overrides?: Record<string, unknown>;
}

function sharedOverrides(opts: SharedCliOptions): Record<string, unknown> {
	return {
		logLevel: opts.logLevel,
		logToFile: opts.logFile === false ? false : undefined,
		concurrency: opts.concurrency,
	};
}

/**
 * Runs one batch tool end to end. The exit code is 0 on success and 1 on
 * configuration errors or when any file failed.
 */
export async function executeTool(
	invocation: ToolInvocation,
	deps: CliDeps,
): Promise<{ exitCode: number; summary: RunSummary | null }> {
	const logging = new LoggingService(LogLevel.INFO, deps.console);
	const log = logging.scoped("cli");

	try {
		const settings = await loadSettings(deps.fs, {
			cwd: deps.cwd,
			env: deps.env,
			configPath: invocation.options.config,
			overrides: {
				...sharedOverrides(invocation.options),
				...invocation.overrides,
			},
		});
		if (isErr(settings)) {
			log.error(formatAppFailure(settings.error));
			return { exitCode: 1, summary: null };
		}
		logging.setLevel(settings.value.logLevel);

		const root = resolveTargetDirectory(
			invocation.tool.name,
			settings.value,
			invocation.directory,
			deps.cwd,
		);
		if (isErr(root)) {
			log.error(formatAppFailure(root.error));
			return { exitCode: 1, summary: null };
		}

		const runner = new BatchRunner(deps.fs, logging, deps.prompts, deps.clock);
		const run = await runner.run({
			tool: invocation.tool,
			root: root.value,
			settings: settings.value,
			apply: invocation.options.go === true,
			assumeYes: invocation.options.yes === true,
			cwd: deps.cwd,
			signal: deps.signal,
		});
		if (isErr(run)) {
			log.error(formatAppFailure(run.error));
			return { exitCode: 1, summary: null };
		}
		return { exitCode: run.value.failed > 0 ? 1 : 0, summary: run.value };
	} finally {
		await logging.dispose();
	}
}
