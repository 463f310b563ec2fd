import path from "node:path";
import { DEFAULT_CONFIG_FILE, ENV, FLASHCARDS_SUBFOLDER } from "../constants";
import { err, isErr, ok, type Result } from "../lib/core/result";
import type { AppFailure, ConfigFailure } from "../lib/errors/types";
import type { FileSystemService } from "../services/FileSystemService";
import type { ToolName, VaultToolsSettings } from "../types";
import { isPlainObject } from "./deepMerge";
import { layerSettings } from "./settingsSchema";

export interface SettingsSources {
	cwd: string;
	env: NodeJS.ProcessEnv;
	/** Explicit config file; takes precedence over the environment variable. */
	configPath?: string;
	/** Raw command-line values, highest precedence. */
	overrides?: Record<string, unknown>;
}

async function readConfigFile(
	fs: FileSystemService,
	sources: SettingsSources,
): Promise<Result<Record<string, unknown>, AppFailure>> {
	const explicit = sources.configPath ?? sources.env[ENV.config];
	const filePath = path.resolve(sources.cwd, explicit ?? DEFAULT_CONFIG_FILE);

	if (explicit === undefined && !(await fs.exists(filePath))) {
		return ok({});
	}

	const text = await fs.readText(filePath);
	if (isErr(text)) {
		if (text.error.kind === "NotFound") {
			return err({
				kind: "ConfigInvalid",
				field: "config",
				reason: `Config file not found: ${filePath}`,
			});
		}
		return text;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text.value);
	} catch (e: unknown) {
		const detail = e instanceof Error ? e.message : String(e);
		return err({
			kind: "ConfigInvalid",
			field: "config",
			reason: `Config file ${filePath} is not valid JSON: ${detail}`,
		});
	}
	if (!isPlainObject(parsed)) {
		return err({
			kind: "ConfigInvalid",
			field: "config",
			reason: `Config file ${filePath} must contain a JSON object`,
		});
	}
	return ok(parsed);
}

function readEnvironment(env: NodeJS.ProcessEnv): Record<string, unknown> {
	return {
		vaultPath: env[ENV.vaultPath],
		flashcardsPath: env[ENV.flashcardsPath],
		logLevel: env[ENV.logLevel],
	};
}

/**
 * Resolves settings from defaults, the config file, the environment and
 * command-line overrides, in increasing precedence.
 */
export async function loadSettings(
	fs: FileSystemService,
	sources: SettingsSources,
): Promise<Result<VaultToolsSettings, AppFailure>> {
	const fileLayer = await readConfigFile(fs, sources);
	if (isErr(fileLayer)) return fileLayer;

	return ok(
		layerSettings(
			fileLayer.value,
			readEnvironment(sources.env),
			sources.overrides ?? {},
		),
	);
}

/**
 * Picks the directory a tool operates on. `explicit` is the positional
 * argument (or `--vault-path` for dataview-limits).
 */
export function resolveTargetDirectory(
	tool: ToolName,
	settings: VaultToolsSettings,
	explicit: string | undefined,
	cwd: string,
): Result<string, ConfigFailure> {
	const fromCwd = (p: string) => path.resolve(cwd, p);
	const vault = settings.vaultPath ? fromCwd(settings.vaultPath) : null;

	switch (tool) {
		case "unclobber":
		case "dataview-limits":
			if (explicit) return ok(fromCwd(explicit));
			if (vault) return ok(vault);
			return err({ kind: "ConfigMissing", field: "vaultPath" });

		case "strip-frontmatter":
			if (explicit) return ok(path.resolve(vault ?? cwd, explicit));
			if (settings.flashcardsPath) return ok(fromCwd(settings.flashcardsPath));
			return ok(path.join(vault ?? cwd, FLASHCARDS_SUBFOLDER));

		case "dedup":
			if (explicit) return ok(fromCwd(explicit));
			return err({ kind: "ConfigMissing", field: "directory" });
	}
}
