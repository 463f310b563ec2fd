import type { CandidateChunk, ExtractedFrontmatter } from "./types";
import { classifyChunk } from "./validator";

/**
 * A delimiter line: `---` at column 0, trailing blanks allowed. Indented
 * dashes (e.g. inside a YAML block scalar) are never a boundary.
 */
const DELIMITER = /^---[ \t]*$/;

interface Line {
	content: string;
	eol: string;
}

function toLines(text: string): Line[] {
	const raw = text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
	return raw.map((line) => {
		const eol = line.endsWith("\r\n") ? "\r\n" : line.endsWith("\n") ? "\n" : "";
		return { content: line.slice(0, line.length - eol.length), eol };
	});
}

export function isDelimiterLine(line: string): boolean {
	return DELIMITER.test(line);
}

/**
 * Splits a document into candidate chunks on delimiter lines. Chunk text
 * excludes the line break before the next delimiter; that break and the
 * delimiter line are kept as the chunk's separator so the text can be
 * rejoined verbatim. Returns an empty list when the document does not open
 * with a delimiter.
 */
export function splitCandidateChunks(text: string): CandidateChunk[] {
	const lines = toLines(text);
	const [first, ...rest] = lines;
	if (!first || !isDelimiterLine(first.content)) return [];

	const chunks: CandidateChunk[] = [];
	let current: Line[] = [];

	for (const line of rest) {
		if (!isDelimiterLine(line.content)) {
			current.push(line);
			continue;
		}
		const last = current[current.length - 1];
		const textPart = current
			.map((l, i) => (i === current.length - 1 ? l.content : l.content + l.eol))
			.join("");
		chunks.push({
			text: textPart,
			separator: (last?.eol ?? "") + line.content + line.eol,
		});
		current = [];
	}
	chunks.push({
		text: current.map((l) => l.content + l.eol).join(""),
		separator: "",
	});

	// Two delimiters in a row leave an empty leading segment
	if (chunks[0]?.text === "") {
		return chunks.slice(1);
	}
	return chunks;
}

/** Drops one leading and one trailing line break. */
function trimOuterLineBreak(body: string): string {
	return body.replace(/^\r?\n/, "").replace(/\r?\n$/, "");
}

/**
 * Extracts all consecutive frontmatter blocks from the start of a document.
 * Scanning stops at the first chunk that is not metadata; that chunk and
 * everything after it, rejoined with the original separators, is the body.
 */
export function extractFrontmatterBlocks(text: string): ExtractedFrontmatter {
	const chunks = splitCandidateChunks(text);
	if (chunks.length === 0) {
		return { blocks: [], body: text };
	}

	const blocks: ExtractedFrontmatter["blocks"] = [];
	let bodyStart = chunks.length;

	for (const [index, chunk] of chunks.entries()) {
		const classification = classifyChunk(chunk.text);
		if (classification.kind === "body") {
			bodyStart = index;
			break;
		}
		blocks.push(classification.mapping);
	}

	const body = chunks
		.slice(bodyStart)
		.map((chunk) => chunk.text + chunk.separator)
		.join("");

	return { blocks, body: trimOuterLineBreak(body) };
}
