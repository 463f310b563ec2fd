/** Integers outside the safe double range are kept exact as `bigint`. */
export type FrontmatterScalar = string | number | bigint | boolean | null;

export type FrontmatterValue =
	| FrontmatterScalar
	| FrontmatterValue[]
	| FrontmatterMapping;

/** Ordered mapping; iteration order is first-seen key order. */
export type FrontmatterMapping = Map<string, FrontmatterValue>;

/** One segment between delimiter lines, with the separator text that followed it. */
export interface CandidateChunk {
	text: string;
	/** Exact separator that ended this chunk, or "" for the last one. */
	separator: string;
}

export interface ExtractedFrontmatter {
	blocks: FrontmatterMapping[];
	body: string;
}

export type ChunkRejection =
	| { reason: "parse-error"; message: string }
	| { reason: "not-a-mapping" }
	| { reason: "implicit-null"; keys: string[] };

export type ChunkClassification =
	| { kind: "metadata"; mapping: FrontmatterMapping }
	| ({ kind: "body" } & ChunkRejection);

export type DatePolicy = "latest" | "earliest";

export type ConflictMode = "auto" | "interactive";

export interface ConflictRecord {
	key: string;
	kept: FrontmatterValue;
	discarded: FrontmatterValue;
	resolvedBy: ConflictMode;
}

export interface PendingConflict {
	key: string;
	existing: FrontmatterValue;
	incoming: FrontmatterValue;
}

export type ConflictChoice = "existing" | "incoming" | "skip";

export type ResolveConflict = (conflict: PendingConflict) => ConflictChoice;

export type ResolveConflictAsync = (
	conflict: PendingConflict,
) => Promise<ConflictChoice>;

export type UnclobberEvent =
	| { type: "blocks-found"; count: number }
	| { type: "conflict"; record: ConflictRecord }
	| { type: "skipped"; key: string };

export type UnchangedReason = "no-frontmatter" | "single-block" | "skipped";

export type UnclobberOutcome =
	| { kind: "unchanged"; reason: UnchangedReason; blockCount: number }
	| {
			kind: "replacement";
			text: string;
			blockCount: number;
			merged: FrontmatterMapping;
			conflicts: ConflictRecord[];
	  };
