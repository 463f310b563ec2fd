import { runPool } from "../../lib/concurrency/pool";
import { isErr, type Result } from "../../lib/core/result";
import {
	type AppFailure,
	FileProcessingError,
	formatAppFailure,
	formatError,
} from "../../lib/errors/types";
import type { FileChange, ToolContext, ToolPlan } from "./types";

export type FileDecision =
	| { kind: "change"; change: FileChange }
	| { kind: "keep"; counter?: string };

export const keep = (counter?: string): FileDecision => ({ kind: "keep", counter });

/**
 * Reads every file as UTF-8 through the pool and asks `decide` what to do
 * with it. Undecodable files are skipped with a warning; read errors and
 * planning errors count as failures.
 */
export async function planEachFile(
	files: readonly string[],
	ctx: ToolContext,
	decide: (
		filePath: string,
		text: string,
	) => Promise<Result<FileDecision, AppFailure>>,
): Promise<ToolPlan> {
	const counters: Record<string, number> = {};
	const bump = (name: string) => {
		counters[name] = (counters[name] ?? 0) + 1;
	};

	const results = await runPool(
		files,
		ctx.settings.concurrency,
		async (filePath): Promise<FileDecision | null> => {
			const text = await ctx.fs.readText(filePath);
			if (isErr(text)) {
				if (text.error.kind === "DecodeFailed") {
					ctx.log.warn(`Skipping ${filePath}: not valid UTF-8`);
					bump("undecodable");
					return null;
				}
				throw new FileProcessingError(filePath, formatAppFailure(text.error), text.error);
			}
			const decision = await decide(filePath, text.value);
			if (isErr(decision)) {
				throw new FileProcessingError(
					filePath,
					formatAppFailure(decision.error),
					decision.error,
				);
			}
			return decision.value;
		},
		ctx.signal,
	);

	const plan: ToolPlan = { changes: [], failed: 0, counters };
	for (const res of results) {
		if (isErr(res)) {
			plan.failed++;
			ctx.log.error(formatError(res.error.error));
			continue;
		}
		const decision = res.value;
		if (decision?.kind === "change") plan.changes.push(decision.change);
		else if (decision?.counter) bump(decision.counter);
	}
	return plan;
}

/** A change that replaces the file's content with `text`. */
export function rewriteFile(
	ctx: ToolContext,
	filePath: string,
	text: string,
): FileDecision {
	return {
		kind: "change",
		change: {
			filePath,
			backup: [filePath],
			apply: () => ctx.fs.writeText(filePath, text),
		},
	};
}
