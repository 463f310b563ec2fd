/**
 * Domain-agnostic string helpers.
 */

/**
 * JSON-stringifies a value for log output. Maps and Sets are rendered as
 * objects/arrays; cycles and unserializable values never throw.
 */
export function safeStringify(value: unknown): string {
	const seen = new WeakSet<object>();
	try {
		return JSON.stringify(value, (_key, v: unknown) => {
			if (v instanceof Map) return Object.fromEntries(v);
			if (v instanceof Set) return [...v];
			if (typeof v === "bigint") return v.toString();
			if (typeof v === "object" && v !== null) {
				if (seen.has(v)) return "[Circular]";
				seen.add(v);
			}
			return v;
		});
	} catch {
		return "[Unserializable Object]";
	}
}

/** Compact run stamp, e.g. `20240601-093015`, in local time. */
export function runStamp(date: Date = new Date()): string {
	const pad = (n: number) => String(n).padStart(2, "0");
	return (
		`${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
		`-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
	);
}
