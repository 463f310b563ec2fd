import { ok, type Result } from "./core/result";
import type { SerializationFailure } from "./errors/types";
import {
	DEFAULT_SERIALIZATION_STRATEGY,
	emitFrontmatterDocument,
	type SerializationStrategy,
} from "./frontmatter/emitter";
import { extractFrontmatterBlocks } from "./frontmatter/splitter";
import type {
	ExtractedFrontmatter,
	ResolveConflict,
	ResolveConflictAsync,
	UnclobberEvent,
	UnclobberOutcome,
} from "./frontmatter/types";
import {
	type MergeOptions,
	type MergeResult,
	mergeFrontmatterBlocks,
	mergeFrontmatterBlocksAsync,
} from "./merge/mergeCore";

export interface UnclobberOptions extends Omit<MergeOptions, "onConflict"> {
	strategy?: SerializationStrategy;
	/** Advisory events: block counts, conflicts, skips. */
	onEvent?: (event: UnclobberEvent) => void;
}

export type UnclobberResult = Result<UnclobberOutcome, SerializationFailure>;

type Prepared =
	| { done: true; outcome: UnclobberOutcome }
	| { done: false; extracted: ExtractedFrontmatter };

function prepare(text: string, options: UnclobberOptions): Prepared {
	const extracted = extractFrontmatterBlocks(text);
	const blockCount = extracted.blocks.length;

	if (blockCount === 0) {
		return {
			done: true,
			outcome: { kind: "unchanged", reason: "no-frontmatter", blockCount },
		};
	}
	if (blockCount === 1) {
		return {
			done: true,
			outcome: { kind: "unchanged", reason: "single-block", blockCount },
		};
	}

	options.onEvent?.({ type: "blocks-found", count: blockCount });
	return { done: false, extracted };
}

function finish(
	extracted: ExtractedFrontmatter,
	merge: MergeResult,
	options: UnclobberOptions,
): UnclobberResult {
	const blockCount = extracted.blocks.length;
	if (merge.status === "skipped") {
		options.onEvent?.({ type: "skipped", key: merge.key });
		return ok({ kind: "unchanged", reason: "skipped", blockCount });
	}

	const text = emitFrontmatterDocument(
		merge.merged,
		extracted.body,
		options.strategy ?? DEFAULT_SERIALIZATION_STRATEGY,
	);
	if (!text.ok) return text;

	return ok({
		kind: "replacement",
		text: text.value,
		blockCount,
		merged: merge.merged,
		conflicts: merge.conflicts,
	});
}

function mergeOptionsFor(options: UnclobberOptions): MergeOptions {
	return {
		datePolicy: options.datePolicy,
		onConflict: (record) => options.onEvent?.({ type: "conflict", record }),
	};
}

/**
 * Repairs clobbered frontmatter in one document. Pure and synchronous: pass a
 * `resolveConflict` decision function for interactive resolution, or omit it
 * to let the later-seen value win.
 */
export function unclobberDocument(
	text: string,
	options: UnclobberOptions & { resolveConflict?: ResolveConflict } = {},
): UnclobberResult {
	const prepared = prepare(text, options);
	if (prepared.done) return ok(prepared.outcome);

	const merge = mergeFrontmatterBlocks(prepared.extracted.blocks, {
		...mergeOptionsFor(options),
		resolveConflict: options.resolveConflict,
	});
	return finish(prepared.extracted, merge, options);
}

/**
 * Variant of {@link unclobberDocument} whose conflicts are decided by an
 * asynchronous capability, e.g. a terminal prompt.
 */
export async function unclobberDocumentAsync(
	text: string,
	resolveConflict: ResolveConflictAsync,
	options: UnclobberOptions = {},
): Promise<UnclobberResult> {
	const prepared = prepare(text, options);
	if (prepared.done) return ok(prepared.outcome);

	const merge = await mergeFrontmatterBlocksAsync(
		prepared.extracted.blocks,
		resolveConflict,
		mergeOptionsFor(options),
	);
	return finish(prepared.extracted, merge, options);
}
