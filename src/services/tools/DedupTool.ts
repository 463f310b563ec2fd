import path from "node:path";
import { runPool } from "../../lib/concurrency/pool";
import { sha256Hex } from "../../lib/core/crypto";
import { isErr, ok } from "../../lib/core/result";
import {
	type HashedFile,
	planDeduplication,
} from "../../lib/duplicates/matching";
import {
	FileProcessingError,
	formatAppFailure,
	formatError,
} from "../../lib/errors/types";
import { stripLeadingFrontmatter } from "../../lib/frontmatter/frontmatterUtils";
import type { BatchTool, FileChange, ToolContext, ToolPlan } from "./types";

/**
 * Finds files whose content (ignoring leading frontmatter) is identical,
 * keeps the copy with the lowest numeric suffix and deletes the rest.
 */
export class DedupTool implements BatchTool {
	readonly name = "dedup";

	async plan(files: readonly string[], ctx: ToolContext): Promise<ToolPlan> {
		const hashed = await runPool(
			files,
			ctx.settings.concurrency,
			async (filePath): Promise<HashedFile> => {
				const read = await ctx.fs.readTextLossy(filePath);
				if (isErr(read)) {
					throw new FileProcessingError(filePath, formatAppFailure(read.error), read.error);
				}
				if (read.value.lossy) {
					ctx.log.warn(
						`${filePath} is not valid UTF-8; hashing with replacement characters`,
					);
				}
				return {
					path: filePath,
					hash: sha256Hex(stripLeadingFrontmatter(read.value.text)),
				};
			},
			ctx.signal,
		);

		const plan: ToolPlan = { changes: [], failed: 0, counters: {} };
		const readable: HashedFile[] = [];
		for (const res of hashed) {
			if (isErr(res)) {
				plan.failed++;
				ctx.log.error(formatError(res.error.error));
			} else {
				readable.push(res.value);
			}
		}

		const dedup = planDeduplication(readable);
		for (const group of dedup.groups) {
			ctx.log.info(
				`Duplicates of ${rel(ctx, group.keep)}: ${group.remove.map((p) => rel(ctx, p)).join(", ")}`,
			);
		}

		plan.changes.push(
			...dedup.deletions.map((filePath) => this.deletion(ctx, filePath)),
		);
		let renames = 0;
		for (const { from, to } of dedup.renames) {
			if (await ctx.fs.exists(to)) {
				ctx.log.warn(`Cannot rename ${rel(ctx, from)}: ${rel(ctx, to)} already exists`);
				continue;
			}
			plan.changes.push(this.rename(ctx, from, to));
			renames++;
		}

		plan.counters = {
			"duplicate groups": dedup.groups.length,
			deletions: dedup.deletions.length,
			renames,
		};
		return plan;
	}

	private deletion(ctx: ToolContext, filePath: string): FileChange {
		return {
			filePath,
			action: "delete",
			backup: [filePath],
			apply: () => ctx.fs.remove(filePath),
		};
	}

	private rename(ctx: ToolContext, from: string, to: string): FileChange {
		return {
			filePath: from,
			action: `rename to ${path.basename(to)}`,
			backup: [from],
			apply: async () => {
				const res = await ctx.fs.rename(from, to);
				if (isErr(res) && res.error.kind === "AlreadyExists") {
					ctx.log.warn(`Cannot rename ${rel(ctx, from)}: ${rel(ctx, to)} already exists`);
					return ok(void 0);
				}
				return res;
			},
		};
	}
}

function rel(ctx: ToolContext, filePath: string): string {
	return path.relative(ctx.root, filePath);
}
