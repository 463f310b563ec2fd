import { parseDocument } from "yaml";
import { err, ok, type Result } from "../core/result";
import { findImplicitNullKeys } from "./implicitNull";
import type {
	ChunkClassification,
	ChunkRejection,
	FrontmatterMapping,
} from "./types";
import { normalizeParsedValue } from "./values";

/**
 * Stage one: does the chunk parse (YAML 1.2 core schema) to a mapping?
 * Top-level keys are stringified; key order is the parse order.
 */
export function parseChunkAsMapping(
	chunk: string,
): Result<FrontmatterMapping, ChunkRejection> {
	let data: unknown;
	try {
		// Integers parse as bigint first; safe ones are narrowed back to number
		const doc = parseDocument(chunk, { intAsBigInt: true });
		const firstError = doc.errors[0];
		if (firstError) {
			return err({ reason: "parse-error", message: firstError.message });
		}
		data = doc.toJS({ mapAsMap: true });
	} catch (e) {
		return err({
			reason: "parse-error",
			message: e instanceof Error ? e.message : String(e),
		});
	}

	if (!(data instanceof Map)) {
		return err({ reason: "not-a-mapping" });
	}

	const normalized = normalizeParsedValue(data);
	if (!normalized.ok) {
		return err({ reason: "parse-error", message: normalized.error });
	}
	if (!(normalized.value instanceof Map)) {
		return err({ reason: "not-a-mapping" });
	}
	return ok(normalized.value);
}

/**
 * Two-stage predicate: a chunk is metadata iff it parses as a mapping AND
 * carries no implicit null. Anything else marks the start of the body.
 */
export function classifyChunk(chunk: string): ChunkClassification {
	const parsed = parseChunkAsMapping(chunk);
	if (!parsed.ok) {
		return { kind: "body", ...parsed.error };
	}

	const implicit = findImplicitNullKeys(chunk, parsed.value);
	if (implicit.length > 0) {
		return { kind: "body", reason: "implicit-null", keys: implicit };
	}
	return { kind: "metadata", mapping: parsed.value };
}
