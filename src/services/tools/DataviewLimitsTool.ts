import { ok } from "../../lib/core/result";
import { addDataviewLimits } from "../../lib/dataview/limits";
import { keep, planEachFile, rewriteFile } from "./planEachFile";
import type { BatchTool, ToolContext, ToolPlan } from "./types";

export class DataviewLimitsTool implements BatchTool {
	readonly name = "dataview-limits";

	async plan(files: readonly string[], ctx: ToolContext): Promise<ToolPlan> {
		const limit = ctx.settings.dataviewLimit;
		return planEachFile(files, ctx, async (filePath, text) => {
			const { content, inserted } = addDataviewLimits(text, limit);
			if (inserted === 0) return ok(keep());
			ctx.log.info(`Adding LIMIT ${limit} to ${inserted} dataview block(s) in: ${filePath}`);
			return ok(rewriteFile(ctx, filePath, content));
		});
	}
}
