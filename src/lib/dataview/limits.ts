const START_BLOCK = /^```\s*dataview\s*$/i;
const END_BLOCK = /^```\s*$/;
const LIMIT_CLAUSE = /\blimit\s+\d+\b/i;

export interface DataviewLimitResult {
	content: string;
	/** Number of dataview blocks that received a LIMIT clause. */
	inserted: number;
}

/**
 * Inserts `LIMIT <n>` before the closing fence of every ```dataview block
 * that has no limit clause yet. Other fenced blocks are left alone.
 */
export function addDataviewLimits(
	content: string,
	limit: number,
): DataviewLimitResult {
	const lines = content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
	const out: string[] = [];
	let inBlock = false;
	let limitFound = false;
	let inserted = 0;

	for (const line of lines) {
		if (!inBlock && START_BLOCK.test(line)) {
			inBlock = true;
			limitFound = false;
		} else if (inBlock) {
			if (END_BLOCK.test(line)) {
				if (!limitFound) {
					out.push(`LIMIT ${limit}\n`);
					inserted++;
				}
				inBlock = false;
			} else if (LIMIT_CLAUSE.test(line)) {
				limitFound = true;
			}
		}
		out.push(line);
	}

	return { content: out.join(""), inserted };
}
