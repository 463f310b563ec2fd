import { ok } from "../../lib/core/result";
import {
	hasFrontmatter,
	stripLeadingFrontmatter,
} from "../../lib/frontmatter/frontmatterUtils";
import { keep, planEachFile, rewriteFile } from "./planEachFile";
import type { BatchTool, ToolContext, ToolPlan } from "./types";

export class StripFrontmatterTool implements BatchTool {
	readonly name = "strip-frontmatter";

	async plan(files: readonly string[], ctx: ToolContext): Promise<ToolPlan> {
		return planEachFile(files, ctx, async (filePath, text) => {
			if (!hasFrontmatter(text)) {
				ctx.log.debug(`No frontmatter in ${filePath}`);
				return ok(keep("without frontmatter"));
			}
			return ok(rewriteFile(ctx, filePath, stripLeadingFrontmatter(text)));
		});
	}
}
