import type { FileSystemFailure } from "./types";

/**
 * Extracts a recognizable FS error code from various error shapes.
 */
export function getFsCode(e: unknown): string | undefined {
	if (typeof e !== "object" || e === null) return undefined;
	if ("code" in e && typeof e.code === "string") return e.code;

	const msg =
		"message" in e && typeof e.message === "string" ? e.message : undefined;
	if (msg) {
		const m = msg.match(/\b(E[A-Z0-9]{2,})\b/);
		if (m) return m[1];
	}
	return undefined;
}

/**
 * Converts a raw error into a `FileSystemFailure` object for use in a `Result`.
 *
 * @param defaultKind The failure kind to use if a specific one cannot be inferred.
 */
export function toFailure(
	error: unknown,
	path: string,
	defaultKind: "ReadFailed" | "WriteFailed" = "ReadFailed",
): FileSystemFailure {
	switch (getFsCode(error)) {
		case "ENOENT":
			return { kind: "NotFound", path };
		case "EACCES":
		case "EPERM":
			return { kind: "PermissionDenied", path };
		case "EISDIR":
			return { kind: "IsADirectory", path };
		case "ENOTDIR":
			return { kind: "NotADirectory", path };
		case "EEXIST":
			return { kind: "AlreadyExists", path };
		case "ENAMETOOLONG":
			return { kind: "NameTooLong", path };
		case "ERR_ENCODING_INVALID_ENCODED_DATA":
			return { kind: "DecodeFailed", path };
	}

	return { kind: defaultKind, path, cause: error };
}
