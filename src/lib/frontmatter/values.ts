import { err, ok, type Result } from "../core/result";
import { safeStringify } from "../strings/stringUtils";
import type {
	FrontmatterMapping,
	FrontmatterScalar,
	FrontmatterValue,
} from "./types";

// YYYY-MM-DD, optional time (T or space), optional fraction, optional Z/offset
const ISO_DATESTAMP =
	/^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

export function isScalar(value: unknown): value is FrontmatterScalar {
	return (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "bigint" ||
		typeof value === "boolean"
	);
}

export function isScalarList(value: unknown): value is FrontmatterScalar[] {
	return Array.isArray(value) && value.every(isScalar);
}

export function isMapping(value: unknown): value is FrontmatterMapping {
	return value instanceof Map;
}

/**
 * Parses an ISO-8601 date or timestamp to epoch milliseconds.
 * A trailing `Z` is UTC; a timestamp without an offset is read as UTC.
 * Returns null for anything that is not a valid calendar instant.
 */
export function parseDatestamp(value: string): number | null {
	const m = ISO_DATESTAMP.exec(value.trim());
	if (!m) return null;

	const [, y, mo, d, h = "00", mi = "00", s = "00", frac = "", zone] = m;
	const ms = frac ? Number(`0.${frac}`) * 1000 : 0;
	const base = Date.UTC(
		Number(y),
		Number(mo) - 1,
		Number(d),
		Number(h),
		Number(mi),
		Number(s),
		Math.floor(ms),
	);
	if (Number.isNaN(base)) return null;

	// Reject dates Date.UTC silently rolled over (e.g. 2023-02-30)
	const check = new Date(base);
	if (
		check.getUTCFullYear() !== Number(y) ||
		check.getUTCMonth() !== Number(mo) - 1 ||
		check.getUTCDate() !== Number(d) ||
		Number(h) > 23 ||
		Number(mi) > 59 ||
		Number(s) > 59
	) {
		return null;
	}

	return base - zoneOffsetMs(zone);
}

function zoneOffsetMs(zone: string | undefined): number {
	if (!zone || zone.toUpperCase() === "Z") return 0;
	const sign = zone.startsWith("-") ? -1 : 1;
	const digits = zone.slice(1).replace(":", "");
	const hours = Number(digits.slice(0, 2));
	const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
	return sign * (hours * 60 + minutes) * 60_000;
}

export function isDatestamp(value: unknown): value is string {
	return typeof value === "string" && parseDatestamp(value) !== null;
}

function scalarRank(value: FrontmatterScalar): number {
	if (value === null) return 0;
	switch (typeof value) {
		case "boolean":
			return 1;
		case "number":
		case "bigint":
			return 2;
		default:
			return 3;
	}
}

/**
 * Total order over scalars: null < booleans < numbers < strings.
 */
export function compareScalars(a: FrontmatterScalar, b: FrontmatterScalar): number {
	const rankDiff = scalarRank(a) - scalarRank(b);
	if (rankDiff !== 0) return rankDiff;

	if (typeof a === "boolean" && typeof b === "boolean") {
		return Number(a) - Number(b);
	}
	if (typeof a === "number" && typeof b === "number") {
		if (Number.isNaN(a) || Number.isNaN(b)) {
			return Number(Number.isNaN(b)) - Number(Number.isNaN(a));
		}
		return a === b ? 0 : a < b ? -1 : 1;
	}
	if (isNumeric(a) && isNumeric(b)) {
		// number and bigint compare by value across types
		return a < b ? -1 : a > b ? 1 : 0;
	}
	if (typeof a === "string" && typeof b === "string") {
		return a === b ? 0 : a < b ? -1 : 1;
	}
	return 0;
}

function isNumeric(value: FrontmatterScalar): value is number | bigint {
	return typeof value === "number" || typeof value === "bigint";
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** Sorted, deduplicated union of scalar lists. */
export function sortedUnion(...lists: FrontmatterScalar[][]): FrontmatterScalar[] {
	const seen = new Set<FrontmatterScalar>();
	for (const list of lists) {
		for (const item of list) seen.add(item);
	}
	return [...seen].sort(compareScalars);
}

/** Structural equality. Mapping key order is ignored. */
export function valuesEqual(a: FrontmatterValue, b: FrontmatterValue): boolean {
	if (isScalar(a) || isScalar(b)) {
		return Object.is(a, b) || a === b;
	}
	if (Array.isArray(a) && Array.isArray(b)) {
		return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i] ?? null));
	}
	if (isMapping(a) && isMapping(b)) {
		if (a.size !== b.size) return false;
		for (const [key, value] of a) {
			const other = b.get(key);
			if (other === undefined || !valuesEqual(value, other)) return false;
		}
		return true;
	}
	return false;
}

/**
 * Narrows a value produced by the YAML parser (with `mapAsMap`) into a
 * FrontmatterValue. Nested mapping keys are stringified.
 */
export function normalizeParsedValue(
	value: unknown,
): Result<FrontmatterValue, string> {
	if (typeof value === "bigint") {
		return ok(value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value);
	}
	if (isScalar(value)) return ok(value);
	if (value instanceof Date) return ok(value.toISOString());

	if (Array.isArray(value)) {
		const items: FrontmatterValue[] = [];
		for (const item of value) {
			const r = normalizeParsedValue(item);
			if (!r.ok) return r;
			items.push(r.value);
		}
		return ok(items);
	}

	if (value instanceof Map) {
		const mapping: FrontmatterMapping = new Map();
		for (const [key, item] of value) {
			const r = normalizeParsedValue(item);
			if (!r.ok) return r;
			mapping.set(String(key), r.value);
		}
		return ok(mapping);
	}

	if (value instanceof Set) {
		return normalizeParsedValue([...value]);
	}

	return err(`unsupported value of type ${typeof value}`);
}

/** Plain-JS view of a value, for logging and JSON output. */
export function toPlain(value: FrontmatterValue): unknown {
	if (isMapping(value)) {
		return Object.fromEntries(
			[...value].map(([key, item]) => [key, toPlain(item)]),
		);
	}
	if (Array.isArray(value)) return value.map(toPlain);
	return value;
}

export function describeValue(value: FrontmatterValue): string {
	const plain = toPlain(value);
	if (typeof plain === "string") return plain;
	if (typeof plain === "bigint") return plain.toString();
	return safeStringify(plain);
}
