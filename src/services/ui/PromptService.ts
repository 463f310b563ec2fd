import { createInterface, type Interface } from "node:readline";
import { Mutex } from "../../lib/concurrency/mutex";
import { describeValue } from "../../lib/frontmatter/values";
import type {
	ConflictChoice,
	PendingConflict,
} from "../../lib/frontmatter/types";

export type ConfirmationDecision = "confirm" | "cancel";

/** Asks one question and resolves with the raw answer ("" on end of input). */
export type Ask = (question: string) => Promise<string>;

/**
 * Reads answers line by line from one readline interface, opened on the
 * first question. Lines that arrive before they are asked for (piped input)
 * are queued for later questions. After end of input every answer is "".
 */
export class TerminalQuestions {
	private rl: Interface | null = null;
	private ended = false;
	private readonly buffered: string[] = [];
	private readonly waiting: Array<(line: string) => void> = [];

	constructor(
		private readonly input: NodeJS.ReadableStream = process.stdin,
		private readonly output: NodeJS.WritableStream = process.stdout,
	) {}

	readonly ask: Ask = (question) => {
		this.open();
		this.output.write(question);
		const line = this.buffered.shift();
		if (line !== undefined) return Promise.resolve(line);
		if (this.ended) return Promise.resolve("");
		return new Promise((resolve) => this.waiting.push(resolve));
	};

	/** Releases the input so the process can exit. */
	close(): void {
		this.rl?.close();
	}

	private open(): void {
		if (this.rl || this.ended) return;
		const rl = createInterface({ input: this.input, crlfDelay: Infinity });
		rl.on("line", (line) => {
			const next = this.waiting.shift();
			if (next) next(line);
			else this.buffered.push(line);
		});
		rl.on("close", () => {
			this.ended = true;
			this.rl = null;
			for (const resolve of this.waiting.splice(0)) resolve("");
		});
		this.rl = rl;
	}
}

const CONFLICT_CHOICES = new Map<string, ConflictChoice>([
	["1", "existing"],
	["2", "incoming"],
	["s", "skip"],
]);

/**
 * Terminal prompts. Questions are queued so concurrent files never
 * interleave their output.
 */
export class PromptService {
	private readonly queue = new Mutex();

	constructor(private readonly ask: Ask = new TerminalQuestions().ask) {}

	async confirm(message: string): Promise<ConfirmationDecision> {
		return this.queue.lock(async () => {
			const answer = await this.ask(`${message} [N/y] `);
			return answer.trim().toLowerCase() === "y" ? "confirm" : "cancel";
		});
	}

	/**
	 * Shows both values of a conflicting key and asks which to keep. Repeats
	 * until the answer is `1`, `2` or `s`; an empty answer counts as skip.
	 */
	async chooseConflictValue(
		filePath: string,
		conflict: PendingConflict,
	): Promise<ConflictChoice> {
		return this.queue.lock(async () => {
			const question = [
				`Conflict in ${filePath} for key '${conflict.key}':`,
				`  1) ${describeValue(conflict.existing)}`,
				`  2) ${describeValue(conflict.incoming)}`,
				"Keep [1] existing, [2] incoming, or [s]kip this file? ",
			].join("\n");

			while (true) {
				const answer = (await this.ask(question)).trim().toLowerCase();
				if (answer === "") return "skip";
				const choice = CONFLICT_CHOICES.get(answer);
				if (choice) return choice;
			}
		});
	}
}
