import { Command, InvalidArgumentError, Option } from "commander";
import type { DatePolicy } from "../lib/frontmatter/types";
import { DataviewLimitsTool } from "../services/tools/DataviewLimitsTool";
import { DedupTool } from "../services/tools/DedupTool";
import { StripFrontmatterTool } from "../services/tools/StripFrontmatterTool";
import { UnclobberTool } from "../services/tools/UnclobberTool";
import {
	type CliDeps,
	executeTool,
	type SharedCliOptions,
	type ToolInvocation,
} from "./executeTool";

export function parsePositiveInt(value: string): number {
	const n = Number(value);
	if (!Number.isInteger(n) || n < 1) {
		throw new InvalidArgumentError("Expected a positive integer.");
	}
	return n;
}

function parseLogLevel(value: string): number {
	const n = Number(value);
	if (!Number.isInteger(n) || n < 0 || n > 4) {
		throw new InvalidArgumentError("Expected 0 (none) to 4 (debug).");
	}
	return n;
}

function withSharedOptions(command: Command): Command {
	return command
		.option("--go", "Apply changes (default is a dry run)")
		.option("-y, --yes", "Skip the confirmation prompt")
		.option("--config <path>", "JSON config file")
		.option("--log-level <n>", "0 none, 1 error, 2 warn, 3 info, 4 debug", parseLogLevel)
		.option("--no-log-file", "Do not write out.log for this run")
		.option("--concurrency <n>", "Files processed in parallel", parsePositiveInt);
}

async function run(invocation: ToolInvocation, deps: CliDeps): Promise<void> {
	const { exitCode } = await executeTool(invocation, deps);
	if (exitCode !== 0) {
		process.exitCode = exitCode;
	}
}

interface UnclobberCliOptions extends SharedCliOptions {
	interactive?: boolean;
	datePolicy?: DatePolicy;
}

export function unclobberCommand(deps: CliDeps): Command {
	return withSharedOptions(
		new Command("unclobber")
			.description("Merge stacked frontmatter blocks into one")
			.argument("[directory]", "Vault directory (default: vaultPath)"),
	)
		.option("--interactive", "Ask which value to keep for each conflict")
		.addOption(
			new Option("--date-policy <policy>", "Which date wins a conflict").choices([
				"latest",
				"earliest",
			]),
		)
		.action((directory: string | undefined, options: UnclobberCliOptions) =>
			run(
				{
					tool: new UnclobberTool(),
					directory,
					options,
					overrides: {
						conflictMode: options.interactive ? "interactive" : undefined,
						datePolicy: options.datePolicy,
					},
				},
				deps,
			),
		);
}

export function stripFrontmatterCommand(deps: CliDeps): Command {
	return withSharedOptions(
		new Command("strip-frontmatter")
			.description("Remove the leading frontmatter block from every note")
			.argument(
				"[directory]",
				"Notes directory (default: flashcardsPath, else <vault>/flashcards)",
			),
	).action((directory: string | undefined, options: SharedCliOptions) =>
		run({ tool: new StripFrontmatterTool(), directory, options }, deps),
	);
}

export function dedupCommand(deps: CliDeps): Command {
	return withSharedOptions(
		new Command("dedup")
			.description("Delete notes whose content duplicates another note")
			.argument("<directory>", "Directory to deduplicate"),
	).action((directory: string, options: SharedCliOptions) =>
		run({ tool: new DedupTool(), directory, options }, deps),
	);
}

interface DataviewCliOptions extends SharedCliOptions {
	vaultPath?: string;
	limit?: number;
}

export function dataviewLimitsCommand(deps: CliDeps): Command {
	return withSharedOptions(
		new Command("dataview-limits").description(
			"Add a LIMIT clause to dataview queries that have none",
		),
	)
		.option("--vault-path <dir>", "Vault directory (default: vaultPath)")
		.option("-l, --limit <n>", "LIMIT value to insert", parsePositiveInt)
		.action((options: DataviewCliOptions) =>
			run(
				{
					tool: new DataviewLimitsTool(),
					directory: options.vaultPath,
					options,
					overrides: { dataviewLimit: options.limit },
				},
				deps,
			),
		);
}
