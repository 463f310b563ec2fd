import type { ConflictMode, DatePolicy } from "./lib/frontmatter/types";

export type LogLevelSetting = 0 | 1 | 2 | 3 | 4; // 0=None, 1=Error, 2=Warn, 3=Info, 4=Debug

export interface VaultToolsSettings {
	vaultPath: string;
	flashcardsPath: string;
	excludedFolders: string[];
	logLevel: LogLevelSetting;
	logToFile: boolean;
	logsFolder: string;
	concurrency: number;
	datePolicy: DatePolicy;
	conflictMode: ConflictMode;
	dataviewLimit: number;
}

export type ToolName =
	| "unclobber"
	| "strip-frontmatter"
	| "dedup"
	| "dataview-limits";

export interface Disposable {
	dispose(): void | Promise<void>;
}
