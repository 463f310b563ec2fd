import { createHash } from "node:crypto";

export type CanonicalizeOptions = {
	normalizeEol?: boolean; // default false: hash exact bytes
	trim?: boolean; // default false
};

/**
 * Applies normalization rules to a string before hashing.
 */
export function canonicalize(
	input: string,
	opts: CanonicalizeOptions = {},
): string {
	const { normalizeEol = false, trim = false } = opts;

	let s = input;
	if (normalizeEol) {
		s = s.replace(/\r\n/g, "\n");
	}
	if (trim) {
		s = s.trim();
	}
	return s;
}

/**
 * Synchronously computes a SHA-256 hash of the input string (UTF-8).
 */
export function sha256Hex(input: string, opts?: CanonicalizeOptions): string {
	return createHash("sha256")
		.update(canonicalize(input, opts), "utf8")
		.digest("hex");
}
