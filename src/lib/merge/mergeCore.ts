import {
	isDatestamp,
	isScalar,
	isScalarList,
	parseDatestamp,
	sortedUnion,
	valuesEqual,
} from "../frontmatter/values";
import type {
	ConflictChoice,
	ConflictMode,
	ConflictRecord,
	DatePolicy,
	FrontmatterMapping,
	FrontmatterValue,
	PendingConflict,
	ResolveConflict,
	ResolveConflictAsync,
} from "../frontmatter/types";

export type MergeResult =
	| { status: "merged"; merged: FrontmatterMapping; conflicts: ConflictRecord[] }
	| { status: "skipped"; key: string; conflicts: ConflictRecord[] };

export interface MergeOptions {
	datePolicy?: DatePolicy;
	onConflict?: (record: ConflictRecord) => void;
}

type MergeSteps = Generator<PendingConflict, MergeResult, ConflictChoice>;

/**
 * Picks between two date-like strings. Equal instants keep the existing value.
 */
export function pickDate(
	existing: string,
	incoming: string,
	policy: DatePolicy,
): string {
	const a = parseDatestamp(existing) ?? 0;
	const b = parseDatestamp(incoming) ?? 0;
	if (a === b) return existing;
	if (policy === "latest") return b > a ? incoming : existing;
	return b < a ? incoming : existing;
}

/**
 * Resolves one key without outside help, or returns null when the two values
 * genuinely conflict.
 */
export function resolveWithoutConflict(
	existing: FrontmatterValue,
	incoming: FrontmatterValue,
	datePolicy: DatePolicy,
): { value: FrontmatterValue } | null {
	if (isDatestamp(existing) && isDatestamp(incoming)) {
		return { value: pickDate(existing, incoming, datePolicy) };
	}
	if (isScalarList(existing) && isScalarList(incoming)) {
		return { value: sortedUnion(existing, incoming) };
	}
	if (isScalarList(existing) && isScalar(incoming)) {
		return { value: sortedUnion(existing, [incoming]) };
	}
	if (isScalar(existing) && isScalarList(incoming)) {
		return { value: sortedUnion(incoming, [existing]) };
	}
	if (valuesEqual(existing, incoming)) {
		return { value: existing };
	}
	return null;
}

function* mergeSteps(
	blocks: FrontmatterMapping[],
	mode: ConflictMode,
	options: MergeOptions,
): MergeSteps {
	const datePolicy = options.datePolicy ?? "latest";
	const merged: FrontmatterMapping = new Map();
	const conflicts: ConflictRecord[] = [];

	for (const block of blocks) {
		for (const [key, incoming] of block) {
			const existing = merged.get(key);
			if (existing === undefined) {
				merged.set(key, incoming);
				continue;
			}

			const resolved = resolveWithoutConflict(existing, incoming, datePolicy);
			if (resolved) {
				merged.set(key, resolved.value);
				continue;
			}

			const choice: ConflictChoice = yield { key, existing, incoming };
			if (choice === "skip") {
				return { status: "skipped", key, conflicts };
			}

			const keepIncoming = choice === "incoming";
			const record: ConflictRecord = {
				key,
				kept: keepIncoming ? incoming : existing,
				discarded: keepIncoming ? existing : incoming,
				resolvedBy: mode,
			};
			conflicts.push(record);
			options.onConflict?.(record);
			merged.set(key, record.kept);
		}
	}

	return { status: "merged", merged, conflicts };
}

/**
 * Merges frontmatter blocks key by key, in block order. Without a resolver,
 * a genuine conflict is settled automatically: the later-seen value wins.
 */
export function mergeFrontmatterBlocks(
	blocks: FrontmatterMapping[],
	options: MergeOptions & { resolveConflict?: ResolveConflict } = {},
): MergeResult {
	const { resolveConflict } = options;
	const mode: ConflictMode = resolveConflict ? "interactive" : "auto";
	const decide: ResolveConflict = resolveConflict ?? (() => "incoming");

	const steps = mergeSteps(blocks, mode, options);
	let next = steps.next();
	while (!next.done) {
		next = steps.next(decide(next.value));
	}
	return next.value;
}

/**
 * Same as {@link mergeFrontmatterBlocks}, but suspends on each conflict until
 * the asynchronous resolver answers.
 */
export async function mergeFrontmatterBlocksAsync(
	blocks: FrontmatterMapping[],
	resolveConflict: ResolveConflictAsync,
	options: MergeOptions = {},
): Promise<MergeResult> {
	const steps = mergeSteps(blocks, "interactive", options);
	let next = steps.next();
	while (!next.done) {
		next = steps.next(await resolveConflict(next.value));
	}
	return next.value;
}
