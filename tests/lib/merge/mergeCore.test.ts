import type {
	ConflictRecord,
	FrontmatterMapping,
	FrontmatterValue,
} from "src/lib/frontmatter/types";
import {
	mergeFrontmatterBlocks,
	mergeFrontmatterBlocksAsync,
	pickDate,
	resolveWithoutConflict,
} from "src/lib/merge/mergeCore";

const block = (entries: Record<string, FrontmatterValue>): FrontmatterMapping =>
	new Map(Object.entries(entries));

describe("mergeFrontmatterBlocks", () => {
	it("unions disjoint keys in first-seen order", () => {
		const result = mergeFrontmatterBlocks([
			block({ title: "T", id: 7 }),
			block({ tags: ["x"] }),
		]);
		expect(result).toEqual({
			status: "merged",
			merged: block({ title: "T", id: 7, tags: ["x"] }),
			conflicts: [],
		});
		if (result.status === "merged") {
			expect([...result.merged.keys()]).toEqual(["title", "id", "tags"]);
		}
	});

	it("unions scalar lists, sorted and without duplicates", () => {
		const result = mergeFrontmatterBlocks([
			block({ tags: ["b", "a"] }),
			block({ tags: ["b", "c"] }),
		]);
		expect(result.status === "merged" && result.merged.get("tags")).toEqual([
			"a",
			"b",
			"c",
		]);
	});

	it("folds a scalar into a list on either side", () => {
		const left = mergeFrontmatterBlocks([block({ k: "x" }), block({ k: ["y"] })]);
		const right = mergeFrontmatterBlocks([block({ k: ["y"] }), block({ k: "x" })]);
		expect(left.status === "merged" && left.merged.get("k")).toEqual(["x", "y"]);
		expect(right.status === "merged" && right.merged.get("k")).toEqual(["x", "y"]);
	});

	it("keeps the later date under the default policy", () => {
		const blocks = [
			block({ date: "2023-01-01T00:00:00Z" }),
			block({ date: "2024-06-01T00:00:00Z" }),
		];
		const latest = mergeFrontmatterBlocks(blocks);
		const earliest = mergeFrontmatterBlocks(blocks, { datePolicy: "earliest" });

		expect(latest.status === "merged" && latest.merged.get("date")).toBe(
			"2024-06-01T00:00:00Z",
		);
		expect(earliest.status === "merged" && earliest.merged.get("date")).toBe(
			"2023-01-01T00:00:00Z",
		);
		expect(latest.conflicts).toEqual([]);
	});

	it("does not count equal values as a conflict", () => {
		const result = mergeFrontmatterBlocks([
			block({ meta: block({ a: 1, b: 2 }) }),
			block({ meta: block({ b: 2, a: 1 }) }),
		]);
		expect(result.conflicts).toEqual([]);
	});

	it("lets the later value win in automatic mode and records it", () => {
		const seen: ConflictRecord[] = [];
		const result = mergeFrontmatterBlocks(
			[block({ a: 1 }), block({ a: 2, b: 3 })],
			{ onConflict: (record) => seen.push(record) },
		);
		const expected: ConflictRecord = {
			key: "a",
			kept: 2,
			discarded: 1,
			resolvedBy: "auto",
		};
		expect(result).toEqual({
			status: "merged",
			merged: block({ a: 2, b: 3 }),
			conflicts: [expected],
		});
		expect(seen).toEqual([expected]);
	});

	it("treats lists of mappings and nested mappings as conflicts", () => {
		const result = mergeFrontmatterBlocks([
			block({ items: [block({ n: 1 })], meta: block({ x: 1 }) }),
			block({ items: [block({ n: 2 })], meta: block({ x: 2 }) }),
		]);
		expect(result.conflicts.map((c) => c.key)).toEqual(["items", "meta"]);
	});

	it("asks the resolver and honours its choice", () => {
		const resolveConflict = vi.fn().mockReturnValue("existing");
		const result = mergeFrontmatterBlocks([block({ a: 1 }), block({ a: 2 })], {
			resolveConflict,
		});
		expect(resolveConflict).toHaveBeenCalledWith({
			key: "a",
			existing: 1,
			incoming: 2,
		});
		expect(result.status === "merged" && result.merged.get("a")).toBe(1);
		expect(result.conflicts[0]?.resolvedBy).toBe("interactive");
	});

	it("stops at the first skip", () => {
		const result = mergeFrontmatterBlocks(
			[block({ a: 1, b: 1 }), block({ a: 2, b: 2 })],
			{ resolveConflict: () => "skip" },
		);
		expect(result).toEqual({ status: "skipped", key: "a", conflicts: [] });
	});
});

describe("mergeFrontmatterBlocksAsync", () => {
	it("waits for each answer in order", async () => {
		const answers = ["incoming", "existing"] as const;
		const asked: string[] = [];
		const result = await mergeFrontmatterBlocksAsync(
			[block({ a: 1, b: "x" }), block({ a: 2, b: "y" })],
			async (conflict) => {
				asked.push(conflict.key);
				return answers[asked.length - 1] ?? "skip";
			},
		);
		expect(asked).toEqual(["a", "b"]);
		expect(result.status === "merged" && result.merged).toEqual(
			block({ a: 2, b: "x" }),
		);
	});
});

describe("resolution helpers", () => {
	it("keeps the existing date when both name the same instant", () => {
		expect(
			pickDate("2024-06-01T02:00:00+02:00", "2024-06-01T00:00:00Z", "latest"),
		).toBe("2024-06-01T02:00:00+02:00");
	});

	it("reports a genuine conflict as null", () => {
		expect(resolveWithoutConflict("2024-01-01", "soon", "latest")).toBeNull();
		expect(resolveWithoutConflict(true, false, "latest")).toBeNull();
	});
});
