export function isPlainObject(v: unknown): v is Record<string, unknown> {
	return !!v && typeof v === "object" && !Array.isArray(v);
}

/**
 * Pure deep merge for plain objects. Arrays are replaced, not merged, and
 * `undefined` values in `next` never override `base`.
 */
export function deepMerge(
	base: Record<string, unknown>,
	next: Record<string, unknown>,
): Record<string, unknown> {
	const out: Record<string, unknown> = { ...base };

	for (const [key, value] of Object.entries(next)) {
		if (value === undefined) continue;

		const baseValue = base[key];
		if (isPlainObject(value) && isPlainObject(baseValue)) {
			out[key] = deepMerge(baseValue, value);
		} else {
			out[key] = value;
		}
	}
	return out;
}
