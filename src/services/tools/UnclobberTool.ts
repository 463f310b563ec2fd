import { err, ok } from "../../lib/core/result";
import type { UnclobberEvent } from "../../lib/frontmatter/types";
import { describeValue } from "../../lib/frontmatter/values";
import {
	type UnclobberOptions,
	unclobberDocument,
	unclobberDocumentAsync,
} from "../../lib/unclobber";
import { keep, planEachFile, rewriteFile } from "./planEachFile";
import type { BatchTool, ToolContext, ToolPlan } from "./types";

/**
 * Merges clobbered frontmatter in every Markdown file. Conflicts are settled
 * by the later block unless interactive mode is on and changes will be
 * written, in which case the user picks.
 */
export class UnclobberTool implements BatchTool {
	readonly name = "unclobber";

	async plan(files: readonly string[], ctx: ToolContext): Promise<ToolPlan> {
		const interactive =
			ctx.settings.conflictMode === "interactive" && ctx.applying;

		// A pending prompt suspends only its own file; PromptService queues the questions
		return planEachFile(files, ctx, async (filePath, text) => {
			const options: UnclobberOptions = {
				datePolicy: ctx.settings.datePolicy,
				onEvent: (event) => this.report(ctx, filePath, event),
			};
			const result = interactive
				? await unclobberDocumentAsync(
						text,
						(conflict) => ctx.prompts.chooseConflictValue(filePath, conflict),
						options,
					)
				: unclobberDocument(text, options);

			if (!result.ok) return err(result.error);
			const outcome = result.value;
			if (outcome.kind === "unchanged") {
				return ok(keep(outcome.reason === "skipped" ? "skipped" : undefined));
			}
			return ok(rewriteFile(ctx, filePath, outcome.text));
		});
	}

	private report(ctx: ToolContext, filePath: string, event: UnclobberEvent) {
		switch (event.type) {
			case "blocks-found":
				ctx.log.info(`Found ${event.count} frontmatter blocks in: ${filePath}`);
				break;
			case "conflict": {
				const { key, kept, discarded, resolvedBy } = event.record;
				ctx.log.warn(
					`Conflict on '${key}' in ${filePath}: kept ${describeValue(kept)}, discarded ${describeValue(discarded)} (${resolvedBy})`,
				);
				break;
			}
			case "skipped":
				ctx.log.info(`Skipped ${filePath} at key '${event.key}'`);
				break;
		}
	}
}
