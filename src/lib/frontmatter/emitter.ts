import { stringify } from "yaml";
import { err, ok, type Result } from "../core/result";
import type { SerializationFailure } from "../errors/types";
import type { FrontmatterMapping, FrontmatterValue } from "./types";
import { compareScalars, isMapping, isScalarList } from "./values";

/**
 * Decides how each merged value is rendered. Passed explicitly to the
 * emitter so that rendering rules never live in global parser state.
 */
export interface SerializationStrategy {
	represent(
		key: string,
		value: FrontmatterValue,
	): Result<FrontmatterValue, SerializationFailure>;
}

export interface SerializationStrategyOptions {
	/**
	 * Emit every list of scalars sorted ascending. Default false: lists keep
	 * their source order, and only merged lists (already sorted) come out sorted.
	 */
	sortSequences?: boolean;
}

export function createSerializationStrategy(
	opts: SerializationStrategyOptions = {},
): SerializationStrategy {
	const sortSequences = opts.sortSequences ?? false;

	const render = (value: FrontmatterValue): FrontmatterValue => {
		if (isScalarList(value)) {
			return sortSequences ? [...value].sort(compareScalars) : [...value];
		}
		if (Array.isArray(value)) return value.map(render);
		if (isMapping(value)) {
			return new Map(
				[...value].map(([k, v]): [string, FrontmatterValue] => [k, render(v)]),
			);
		}
		return value;
	};

	return {
		represent: (_key, value) => ok(render(value)),
	};
}

export const DEFAULT_SERIALIZATION_STRATEGY = createSerializationStrategy();

// Mapping indent 2; sequences indented under their key ("  - item")
const YAML_OUTPUT_OPTIONS = {
	indent: 2,
	indentSeq: true,
	lineWidth: 0,
	minContentWidth: 0,
} as const;

/**
 * Serializes a mapping to YAML text (with trailing newline), without delimiters.
 */
export function serializeFrontmatter(
	mapping: FrontmatterMapping,
	strategy: SerializationStrategy = DEFAULT_SERIALIZATION_STRATEGY,
): Result<string, SerializationFailure> {
	const rendered: FrontmatterMapping = new Map();
	for (const [key, value] of mapping) {
		const r = strategy.represent(key, value);
		if (!r.ok) return r;
		rendered.set(key, r.value);
	}

	try {
		return ok(stringify(rendered, YAML_OUTPUT_OPTIONS));
	} catch (e) {
		return err({
			kind: "UnrepresentableValue",
			key: "*",
			reason: e instanceof Error ? e.message : String(e),
		});
	}
}

/**
 * Reassembles a document: one frontmatter block, a blank line, the body and
 * a trailing newline.
 */
export function emitFrontmatterDocument(
	mapping: FrontmatterMapping,
	body: string,
	strategy: SerializationStrategy = DEFAULT_SERIALIZATION_STRATEGY,
): Result<string, SerializationFailure> {
	const yamlText = serializeFrontmatter(mapping, strategy);
	if (!yamlText.ok) return yamlText;
	return ok(`---\n${yamlText.value}---\n\n${body}\n`);
}
