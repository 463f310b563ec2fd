// Structured error objects for expected failures handled via Result<T, E>

export type FileSystemFailure =
	| { kind: "NotFound"; path: string }
	| { kind: "PermissionDenied"; path: string }
	| { kind: "NotADirectory"; path: string }
	| { kind: "IsADirectory"; path: string }
	| { kind: "AlreadyExists"; path: string }
	| { kind: "NameTooLong"; path: string }
	| { kind: "DecodeFailed"; path: string }
	| { kind: "WriteFailed"; path: string; cause: unknown }
	| { kind: "ReadFailed"; path: string; cause: unknown };

export type SerializationFailure = {
	kind: "UnrepresentableValue";
	key: string;
	reason: string;
};

// Configuration failures for settings and required fields
export type ConfigFailure =
	| { kind: "ConfigMissing"; field: string }
	| { kind: "ConfigInvalid"; field: string; reason?: string };

// Union of all expected failures
export type AppFailure = FileSystemFailure | SerializationFailure | ConfigFailure;

/** Base class for all unexpected tool errors. */
export class ToolError extends Error {
	constructor(
		message: string,
		public readonly cause?: unknown,
	) {
		super(message);
		this.name = new.target.name;
	}
}

/** A single file could not be read or planned; the run carries on. */
export class FileProcessingError extends ToolError {
	constructor(
		readonly filePath: string,
		message: string,
		cause?: unknown,
	) {
		super(`${filePath}: ${message}`, cause);
	}
}

/** Type guard for structured AppFailure. */
export function isAppFailure(e: unknown): e is AppFailure {
	return (
		typeof e === "object" &&
		e !== null &&
		"kind" in e &&
		typeof e.kind === "string"
	);
}

/** Maps a structured AppFailure to a user-facing message. */
export function formatAppFailure(failure: AppFailure): string {
	switch (failure.kind) {
		case "NotFound":
			return `File not found: ${failure.path}`;
		case "PermissionDenied":
			return `Permission denied: ${failure.path}`;
		case "NotADirectory":
			return `Not a directory: ${failure.path}`;
		case "IsADirectory":
			return `Expected a file but found a directory: ${failure.path}`;
		case "AlreadyExists":
			return `File already exists: ${failure.path}`;
		case "NameTooLong":
			return `Filename too long: ${failure.path}`;
		case "DecodeFailed":
			return `Not valid UTF-8: ${failure.path}`;
		case "WriteFailed":
			return `Write failed at ${failure.path}: ${describeCause(failure.cause)}`;
		case "ReadFailed":
			return `Read failed at ${failure.path}: ${describeCause(failure.cause)}`;
		case "UnrepresentableValue":
			return `Cannot serialize key '${failure.key}': ${failure.reason}`;
		case "ConfigMissing":
			return `Missing required setting: ${failure.field}`;
		case "ConfigInvalid":
			return failure.reason ?? `Invalid setting: ${failure.field}`;
		default:
			return "Operation failed";
	}
}

function describeCause(cause: unknown): string {
	if (cause instanceof Error) return cause.message;
	return String(cause);
}

/** Unified formatter for any error-ish value. */
export function formatError(error: unknown): string {
	if (isAppFailure(error)) {
		return formatAppFailure(error);
	}
	if (error instanceof Error) {
		return error.message;
	}
	if (typeof error === "string") {
		return error;
	}
	if (error === undefined) {
		return "An unexpected and un-serializable error occurred.";
	}
	try {
		return `An unexpected error occurred: ${JSON.stringify(error)}`;
	} catch {
		return "An unexpected and un-serializable error occurred.";
	}
}
