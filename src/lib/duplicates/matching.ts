import path from "node:path";

// Matches both "note.md" and "note (12).md" (case-insensitive on extension)
const NUMBERED = /^(.*?)(?: \((\d+)\))?\.md$/i;

export interface HashedFile {
	path: string;
	hash: string;
}

export interface DuplicateGroup {
	hash: string;
	keep: string;
	remove: string[];
}

export interface RenameAction {
	from: string;
	to: string;
}

export interface DedupPlan {
	groups: DuplicateGroup[];
	deletions: string[];
	renames: RenameAction[];
}

/** Numeric copy suffix of a file name: `note (2).md` → 2, `note.md` → 0. */
export function numericSuffix(fileName: string): number {
	const m = NUMBERED.exec(fileName);
	return m?.[2] ? Number.parseInt(m[2], 10) : 0;
}

/** `note (2).md` → `note.md`; null when the name is not a Markdown file. */
export function unsuffixedName(fileName: string): string | null {
	const m = NUMBERED.exec(fileName);
	return m ? `${m[1] ?? ""}.md` : null;
}

/**
 * Groups files by content hash and decides, per group, which copy survives:
 * the one with the lowest numeric suffix (ties broken by path). A survivor
 * that still carries a suffix is renamed to the bare name.
 */
export function planDeduplication(files: HashedFile[]): DedupPlan {
	const buckets = new Map<string, string[]>();
	for (const file of files) {
		const bucket = buckets.get(file.hash);
		if (bucket) bucket.push(file.path);
		else buckets.set(file.hash, [file.path]);
	}

	const plan: DedupPlan = { groups: [], deletions: [], renames: [] };

	for (const [hash, paths] of buckets) {
		if (paths.length < 2) continue;

		const ordered = [...paths].sort(
			(a, b) =>
				numericSuffix(path.basename(a)) - numericSuffix(path.basename(b)) ||
				a.localeCompare(b),
		);
		const [keep, ...remove] = ordered;
		if (keep === undefined) continue;

		plan.groups.push({ hash, keep, remove });
		plan.deletions.push(...remove);

		const keepName = path.basename(keep);
		const bare = unsuffixedName(keepName);
		if (numericSuffix(keepName) > 0 && bare) {
			plan.renames.push({ from: keep, to: path.join(path.dirname(keep), bare) });
		}
	}

	return plan;
}
