import type { Result } from "../../lib/core/result";
import type { AppFailure } from "../../lib/errors/types";
import type { ToolName, VaultToolsSettings } from "../../types";
import type { FileSystemService } from "../FileSystemService";
import type { ScopedLogger } from "../LoggingService";
import type { PromptService } from "../ui/PromptService";

export interface ToolContext {
	root: string;
	settings: VaultToolsSettings;
	fs: FileSystemService;
	log: ScopedLogger;
	prompts: PromptService;
	/** False for a dry run; tools must not prompt for decisions that only matter when writing. */
	applying: boolean;
	signal?: AbortSignal;
}

/** One planned modification, applied only after confirmation. */
export interface FileChange {
	/** File the change is about; listed in the dry-run report. */
	filePath: string;
	/** Short description for the dry-run listing when it is not a rewrite. */
	action?: string;
	/** Files to copy into the backup tree before `apply` runs. */
	backup: string[];
	apply(): Promise<Result<void, AppFailure>>;
}

export interface ToolPlan {
	changes: FileChange[];
	/** Files that could not be read or planned. */
	failed: number;
	/** Extra summary counters, e.g. files without frontmatter. */
	counters?: Record<string, number>;
}

export interface BatchTool {
	readonly name: ToolName;
	plan(files: readonly string[], ctx: ToolContext): Promise<ToolPlan>;
}
