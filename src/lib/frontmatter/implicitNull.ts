import type { FrontmatterMapping } from "./types";

function escapeRegExp(s: string): string {
	return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Lists the keys of `mapping` whose null value is **implicit**: the raw YAML
 * has the key followed by nothing (e.g. `question:`) instead of an explicit
 * `key: null` or `key: ~` line.
 */
export function findImplicitNullKeys(
	rawYaml: string,
	mapping: FrontmatterMapping,
): string[] {
	const lines = rawYaml.split(/\r?\n/);
	const implicit: string[] = [];

	for (const [key, value] of mapping) {
		if (value !== null) continue;
		const explicit = new RegExp(
			`^\\s*${escapeRegExp(key)}\\s*:\\s*(null|~)\\s*$`,
			"i",
		);
		if (!lines.some((line) => explicit.test(line))) {
			implicit.push(key);
		}
	}
	return implicit;
}

/**
 * A `Question:` line followed by a blank line parses as a mapping with a null
 * value, but is prose rather than metadata. Returns true when such a null exists.
 */
export function containsImplicitNull(
	rawYaml: string,
	mapping: FrontmatterMapping,
): boolean {
	return findImplicitNullKeys(rawYaml, mapping).length > 0;
}
