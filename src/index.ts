export { unclobberDocument, unclobberDocumentAsync } from "./lib/unclobber";
export type { UnclobberOptions, UnclobberResult } from "./lib/unclobber";

export {
	extractFrontmatterBlocks,
	splitCandidateChunks,
} from "./lib/frontmatter/splitter";
export { classifyChunk, parseChunkAsMapping } from "./lib/frontmatter/validator";
export {
	containsImplicitNull,
	findImplicitNullKeys,
} from "./lib/frontmatter/implicitNull";
export {
	mergeFrontmatterBlocks,
	mergeFrontmatterBlocksAsync,
} from "./lib/merge/mergeCore";
export type { MergeOptions, MergeResult } from "./lib/merge/mergeCore";
export {
	createSerializationStrategy,
	emitFrontmatterDocument,
	serializeFrontmatter,
} from "./lib/frontmatter/emitter";
export type {
	SerializationStrategy,
	SerializationStrategyOptions,
} from "./lib/frontmatter/emitter";
export type * from "./lib/frontmatter/types";

export {
	hasFrontmatter,
	stripLeadingFrontmatter,
} from "./lib/frontmatter/frontmatterUtils";
export { addDataviewLimits } from "./lib/dataview/limits";
export type { DataviewLimitResult } from "./lib/dataview/limits";
export { planDeduplication } from "./lib/duplicates/matching";
export type {
	DedupPlan,
	DuplicateGroup,
	HashedFile,
	RenameAction,
} from "./lib/duplicates/matching";

export { err, isErr, isOk, ok } from "./lib/core/result";
export type { Result } from "./lib/core/result";
export {
	FileProcessingError,
	formatAppFailure,
	formatError,
	ToolError,
} from "./lib/errors/types";
export type {
	AppFailure,
	ConfigFailure,
	FileSystemFailure,
	SerializationFailure,
} from "./lib/errors/types";
