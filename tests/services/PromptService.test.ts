import { PassThrough } from "node:stream";
import { PromptService, TerminalQuestions } from "src/services/ui/PromptService";

const answering = (...answers: string[]) => {
	const ask = vi.fn<(question: string) => Promise<string>>();
	for (const answer of answers) ask.mockResolvedValueOnce(answer);
	return ask;
};

describe("PromptService", () => {
	it("confirms only on y", async () => {
		expect(await new PromptService(answering(" Y ")).confirm("Go?")).toBe("confirm");
		expect(await new PromptService(answering("")).confirm("Go?")).toBe("cancel");
		expect(await new PromptService(answering("yes")).confirm("Go?")).toBe("cancel");
	});

	it("shows the question with the default marked", async () => {
		const ask = answering("n");
		await new PromptService(ask).confirm("About to modify 3 files. Are you sure?");
		expect(ask).toHaveBeenCalledWith("About to modify 3 files. Are you sure? [N/y] ");
	});

	it("asks again until the conflict answer is valid", async () => {
		const ask = answering("x", "2");
		const prompts = new PromptService(ask);
		const choice = await prompts.chooseConflictValue("/v/a.md", {
			key: "title",
			existing: "Old",
			incoming: ["x", 1],
		});
		expect(choice).toBe("incoming");
		expect(ask).toHaveBeenCalledTimes(2);
		expect(ask.mock.calls[0]?.[0]).toBe(
			[
				"Conflict in /v/a.md for key 'title':",
				"  1) Old",
				'  2) ["x",1]',
				"Keep [1] existing, [2] incoming, or [s]kip this file? ",
			].join("\n"),
		);
	});

	it("maps 1, s and an empty answer", async () => {
		const conflict = { key: "k", existing: 1, incoming: 2 };
		expect(await new PromptService(answering("1")).chooseConflictValue("f", conflict)).toBe(
			"existing",
		);
		expect(await new PromptService(answering("S")).chooseConflictValue("f", conflict)).toBe(
			"skip",
		);
		expect(await new PromptService(answering("")).chooseConflictValue("f", conflict)).toBe(
			"skip",
		);
	});
});

describe("TerminalQuestions", () => {
	it("hands piped lines to later questions in order", async () => {
		const input = new PassThrough();
		const output = new PassThrough();
		input.end("2\ny\n");
		const prompts = new PromptService(new TerminalQuestions(input, output).ask);

		const choice = await prompts.chooseConflictValue("n.md", {
			key: "k",
			existing: 1,
			incoming: 2,
		});
		const decision = await prompts.confirm("Go?");

		expect(choice).toBe("incoming");
		expect(decision).toBe("confirm");
		expect(String(output.read())).toMatch(/skip this file\? Go\? \[N\/y\] $/);
	});

	it("answers empty once input has ended", async () => {
		const input = new PassThrough();
		input.end("only\n");
		const terminal = new TerminalQuestions(input, new PassThrough());

		expect(await terminal.ask("first ")).toBe("only");
		expect(await terminal.ask("second ")).toBe("");
		expect(await terminal.ask("third ")).toBe("");
	});
});
