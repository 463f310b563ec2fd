export const TOOL_NAME = "vault-tools";
export const LOG_PREFIX = `${TOOL_NAME}:`;

export const DEFAULT_LOGS_FOLDER = "logs";
export const DEFAULT_CONFIG_FILE = ".vault-tools.json";
export const FLASHCARDS_SUBFOLDER = "flashcards";

/* ------------------------------------------------------------------ */
/*                              FILE SYSTEM                           */
/* ------------------------------------------------------------------ */

export const MARKDOWN_EXTENSION = ".md";
export const BACKUP_SUBFOLDER = "backup";
export const LOG_FILE_NAME = "out.log";

/* ------------------------------------------------------------------ */
/*                               DEFAULTS                             */
/* ------------------------------------------------------------------ */

export const DEFAULT_DATAVIEW_LIMIT = 1000;
export const DEFAULT_CONCURRENCY = 8;

/* ------------------------------------------------------------------ */
/*                          ENVIRONMENT VARIABLES                     */
/* ------------------------------------------------------------------ */

export const ENV = {
	vaultPath: "VAULT_PATH",
	flashcardsPath: "FLASHCARDS_PATH",
	config: "VAULT_TOOLS_CONFIG",
	logLevel: "VAULT_TOOLS_LOG_LEVEL",
} as const;
