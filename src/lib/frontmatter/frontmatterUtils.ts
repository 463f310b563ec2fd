/**
 * Locates the single leading frontmatter block: the first line must be a
 * `---` delimiter (surrounding whitespace ignored) and a later line must
 * close it the same way.
 * @returns The index just past the closing delimiter line, or null.
 */
function leadingFrontmatterEnd(content: string): number | null {
	const lines = content.match(/[^\n]*\n|[^\n]+$/g);
	const first = lines?.[0];
	if (!lines || first === undefined || first.trim() !== "---") return null;

	let offset = first.length;
	for (const line of lines.slice(1)) {
		offset += line.length;
		if (line.trim() === "---") return offset;
	}
	return null;
}

/**
 * Strips the leading frontmatter block, returning only what follows the
 * closing delimiter line. Content without a closed block is returned as-is.
 */
export function stripLeadingFrontmatter(content: string): string {
	const end = leadingFrontmatterEnd(content);
	return end === null ? content : content.slice(end);
}

/**
 * Checks if a string opens with a closed frontmatter block.
 */
export function hasFrontmatter(content: string): boolean {
	return leadingFrontmatterEnd(content) !== null;
}
