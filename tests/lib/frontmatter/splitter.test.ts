import {
	extractFrontmatterBlocks,
	isDelimiterLine,
	splitCandidateChunks,
} from "src/lib/frontmatter/splitter";

describe("isDelimiterLine", () => {
	it("accepts three dashes at column 0 with trailing blanks", () => {
		expect(isDelimiterLine("---")).toBe(true);
		expect(isDelimiterLine("--- \t")).toBe(true);
	});

	it("rejects indented or longer rules", () => {
		expect(isDelimiterLine("  ---")).toBe(false);
		expect(isDelimiterLine("----")).toBe(false);
		expect(isDelimiterLine("--- x")).toBe(false);
	});
});

describe("splitCandidateChunks", () => {
	it("returns nothing when the document does not open with a delimiter", () => {
		expect(splitCandidateChunks("Just text\n---\na: 1\n")).toEqual([]);
		expect(splitCandidateChunks("")).toEqual([]);
	});

	it("keeps the separator that followed each chunk", () => {
		expect(splitCandidateChunks("---\na: 1\n---\nBody\n")).toEqual([
			{ text: "a: 1", separator: "\n---\n" },
			{ text: "Body\n", separator: "" },
		]);
	});

	it("drops the empty segment left by two delimiters in a row", () => {
		expect(splitCandidateChunks("---\n---\na: 1\n---\nx\n")).toEqual([
			{ text: "a: 1", separator: "\n---\n" },
			{ text: "x\n", separator: "" },
		]);
	});

	it("preserves CRLF line endings", () => {
		expect(splitCandidateChunks("---\r\na: 1\r\n---\r\nBody\r\n")).toEqual([
			{ text: "a: 1", separator: "\r\n---\r\n" },
			{ text: "Body\r\n", separator: "" },
		]);
	});
});

describe("extractFrontmatterBlocks", () => {
	it("returns the whole text as body when there is no frontmatter", () => {
		expect(extractFrontmatterBlocks("Just text\n")).toEqual({
			blocks: [],
			body: "Just text\n",
		});
	});

	it("collects consecutive blocks and trims one line break around the body", () => {
		const { blocks, body } = extractFrontmatterBlocks(
			"---\na: 1\n---\na: 2\nb: 3\n---\nBody text\n",
		);
		expect(blocks).toEqual([
			new Map([["a", 1]]),
			new Map<string, number>([
				["a", 2],
				["b", 3],
			]),
		]);
		expect(body).toBe("Body text");
	});

	it("stops at a chunk with an implicit null and keeps it in the body", () => {
		const { blocks, body } = extractFrontmatterBlocks(
			"---\ntitle: x\n---\nquestion:\n---\nrest\n",
		);
		expect(blocks).toEqual([new Map([["title", "x"]])]);
		expect(body).toBe("question:\n---\nrest");
	});

	it("treats an explicit null as metadata", () => {
		const { blocks } = extractFrontmatterBlocks(
			"---\na: 1\n---\nb: null\n---\nBody\n",
		);
		expect(blocks).toEqual([new Map([["a", 1]]), new Map([["b", null]])]);
	});

	it("rejoins later delimiter lines inside the body verbatim", () => {
		const { blocks, body } = extractFrontmatterBlocks(
			"---\na: 1\n---\nb: 2\n---\nText\n---\nMore\n",
		);
		expect(blocks).toHaveLength(2);
		expect(body).toBe("Text\n---\nMore");
	});

	it("finds no blocks for the implicit-null prose case", () => {
		const { blocks } = extractFrontmatterBlocks(
			"---\nquestion:\n\nAnswer text\n---\nMore\n",
		);
		expect(blocks).toEqual([]);
	});
});
