import { LOG_PREFIX } from "../constants";
import { safeStringify } from "../lib/strings/stringUtils";
import type { Disposable, LogLevelSetting } from "../types";
import { AsyncFileSink } from "./AsyncFileSink";
import type { FileSystemService } from "./FileSystemService";

type LevelTag = "DEBUG" | "INFO" | "WARN" | "ERROR";

// Pure formatting functions (functional core)
export const LogFormatters = {
	formatArgs(args: unknown[]): string {
		return args
			.map((x) => {
				if (x instanceof Error) return `${x.message}\n${x.stack ?? ""}`;
				if (typeof x === "object" && x !== null) {
					return safeStringify(x);
				}
				return String(x);
			})
			.join(" ");
	},

	formatLogLine(
		timestamp: string,
		level: LevelTag,
		prefix: string,
		scope: string,
		message: string,
	): string {
		return `${timestamp} ${level.padEnd(5, " ")} ${prefix} [${scope}] ${message}`;
	},
};

/* ------------------------------------------------------------------ */
/*                      MAIN SERVICE CLASS                            */
/* ------------------------------------------------------------------ */

export enum LogLevel {
	NONE = 0,
	ERROR = 1,
	WARN = 2,
	INFO = 3,
	DEBUG = 4,
}

export interface ScopedLogger {
	debug: (...args: unknown[]) => void;
	info: (...args: unknown[]) => void;
	warn: (...args: unknown[]) => void;
	error: (...args: unknown[]) => void;
}

export interface ConsoleLike {
	log: (message: string) => void;
	warn: (message: string) => void;
	error: (message: string) => void;
}

export class LoggingService implements Disposable {
	private level: LogLevel;
	private sink: AsyncFileSink | null = null;

	constructor(
		level: LogLevel = LogLevel.INFO,
		private readonly out: ConsoleLike = console,
	) {
		this.level = level;
	}

	public setLevel(level: LogLevel | LogLevelSetting): void {
		this.level = level;
	}

	/** Starts mirroring log lines into `filePath`, replacing any previous sink. */
	public async attachFile(fs: FileSystemService, filePath: string): Promise<void> {
		await this.detachFile();
		this.sink = new AsyncFileSink(fs, filePath, (message) => {
			this.out.error(
				this.line("ERROR", "LoggingService", `File logging disabled: ${message}`),
			);
		});
	}

	public async detachFile(): Promise<void> {
		if (!this.sink) return;
		const oldSink = this.sink;
		this.sink = null;
		// Await disposal so buffered lines land before a new sink opens
		await oldSink.dispose();
	}

	public get logFilePath(): string | null {
		return this.sink?.filePath ?? null;
	}

	public debug(scope: string, ...args: unknown[]): void {
		this.emit(LogLevel.DEBUG, "DEBUG", scope, args);
	}
	public info(scope: string, ...args: unknown[]): void {
		this.emit(LogLevel.INFO, "INFO", scope, args);
	}
	public warn(scope: string, ...args: unknown[]): void {
		this.emit(LogLevel.WARN, "WARN", scope, args);
	}
	public error(scope: string, ...args: unknown[]): void {
		this.emit(LogLevel.ERROR, "ERROR", scope, args);
	}

	public scoped(scope: string): ScopedLogger {
		return {
			debug: (...args: unknown[]) => this.debug(scope, ...args),
			info: (...args: unknown[]) => this.info(scope, ...args),
			warn: (...args: unknown[]) => this.warn(scope, ...args),
			error: (...args: unknown[]) => this.error(scope, ...args),
		};
	}

	public async dispose(): Promise<void> {
		await this.detachFile();
	}

	private line(tag: LevelTag, scope: string, message: string): string {
		return LogFormatters.formatLogLine(
			new Date().toISOString(),
			tag,
			LOG_PREFIX,
			scope,
			message,
		);
	}

	private emit(
		level: LogLevel,
		tag: LevelTag,
		scope: string,
		args: unknown[],
	): void {
		if (this.level < level) return;

		const line = this.line(tag, scope, LogFormatters.formatArgs(args));

		// Side effects in the shell
		this.consoleFn(level)(line);
		if (!this.sink) return;
		this.sink.append(line);

		// Flush immediately for errors to reduce loss risk
		if (level === LogLevel.ERROR) {
			this.sink.flush().catch((e: unknown) => {
				this.out.error(String(e));
			});
		}
	}

	private consoleFn(level: LogLevel): (message: string) => void {
		return level === LogLevel.ERROR
			? this.out.error
			: level === LogLevel.WARN
				? this.out.warn
				: this.out.log;
	}
}
