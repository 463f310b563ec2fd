import { z } from "zod";
import {
	DEFAULT_CONCURRENCY,
	DEFAULT_DATAVIEW_LIMIT,
	DEFAULT_LOGS_FOLDER,
} from "../constants";
import type { VaultToolsSettings } from "../types";
import { deepMerge } from "./deepMerge";

function coerceBoolLoose(v: unknown): boolean {
	if (typeof v === "boolean") return v;
	if (typeof v === "number") return v === 1;
	if (typeof v === "string") {
		const s = v.trim().toLowerCase();
		return ["true", "1", "yes", "y", "on"].includes(s);
	}
	return false;
}

// --- Base defaults ---
export const BASE_DEFAULTS: VaultToolsSettings = {
	vaultPath: "",
	flashcardsPath: "",
	excludedFolders: [".git", ".obsidian", ".trash", "node_modules"],
	logLevel: 3,
	logToFile: true,
	logsFolder: DEFAULT_LOGS_FOLDER,
	concurrency: DEFAULT_CONCURRENCY,
	datePolicy: "latest",
	conflictMode: "auto",
	dataviewLimit: DEFAULT_DATAVIEW_LIMIT,
};

// --- Raw/partial schema for loading; bad fields fall back to defaults ---
export const RawSettingsSchema = z
	.object({
		vaultPath: z.string().optional(),
		flashcardsPath: z.string().optional(),
		excludedFolders: z
			.array(z.string())
			.catch(() => BASE_DEFAULTS.excludedFolders)
			.optional(),
		logLevel: z.coerce
			.number()
			.int()
			.pipe(
				z.union([
					z.literal(0),
					z.literal(1),
					z.literal(2),
					z.literal(3),
					z.literal(4),
				]),
			)
			.catch(() => BASE_DEFAULTS.logLevel)
			.optional(),
		logToFile: z.unknown().transform(coerceBoolLoose).optional(),
		logsFolder: z.string().min(1).catch(DEFAULT_LOGS_FOLDER).optional(),
		concurrency: z.coerce
			.number()
			.int()
			.min(1)
			.max(64)
			.catch(() => BASE_DEFAULTS.concurrency)
			.optional(),
		datePolicy: z
			.enum(["latest", "earliest"])
			.catch(() => BASE_DEFAULTS.datePolicy)
			.optional(),
		conflictMode: z
			.enum(["auto", "interactive"])
			.catch(() => BASE_DEFAULTS.conflictMode)
			.optional(),
		dataviewLimit: z.coerce
			.number()
			.int()
			.min(1)
			.catch(() => BASE_DEFAULTS.dataviewLimit)
			.optional(),
	})
	.strip();

export type RawSettings = z.infer<typeof RawSettingsSchema>;

/**
 * Validates raw settings and deep-merges them onto the defaults. Unknown
 * keys are dropped; invalid values fall back to their default.
 */
export function normalizeSettings(raw: unknown): VaultToolsSettings {
	const parsedRes = RawSettingsSchema.safeParse(raw ?? {});
	const parsed: RawSettings = parsedRes.success ? parsedRes.data : {};

	const merged = { ...BASE_DEFAULTS, ...stripUndefined(parsed) };

	merged.vaultPath = merged.vaultPath.trim();
	merged.flashcardsPath = merged.flashcardsPath.trim();
	merged.excludedFolders = merged.excludedFolders
		.map((f) => f.trim())
		.filter(Boolean);

	return merged;
}

function stripUndefined(parsed: RawSettings): Partial<VaultToolsSettings> {
	const out: Partial<VaultToolsSettings> = {};
	if (parsed.vaultPath !== undefined) out.vaultPath = parsed.vaultPath;
	if (parsed.flashcardsPath !== undefined)
		out.flashcardsPath = parsed.flashcardsPath;
	if (parsed.excludedFolders !== undefined)
		out.excludedFolders = parsed.excludedFolders;
	if (parsed.logLevel !== undefined) out.logLevel = parsed.logLevel;
	if (parsed.logToFile !== undefined) out.logToFile = parsed.logToFile;
	if (parsed.logsFolder !== undefined) out.logsFolder = parsed.logsFolder;
	if (parsed.concurrency !== undefined) out.concurrency = parsed.concurrency;
	if (parsed.datePolicy !== undefined) out.datePolicy = parsed.datePolicy;
	if (parsed.conflictMode !== undefined) out.conflictMode = parsed.conflictMode;
	if (parsed.dataviewLimit !== undefined)
		out.dataviewLimit = parsed.dataviewLimit;
	return out;
}

/**
 * Layers raw setting sources (lowest precedence first) before validation.
 */
export function layerSettings(...layers: Record<string, unknown>[]): VaultToolsSettings {
	const combined = layers.reduce<Record<string, unknown>>(
		(acc, layer) => deepMerge(acc, layer),
		{},
	);
	return normalizeSettings(combined);
}
