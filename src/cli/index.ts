#!/usr/bin/env node
import { FileSystemService } from "../services/FileSystemService";
import { PromptService, TerminalQuestions } from "../services/ui/PromptService";
import { createProgram } from "./program";
import { writeStderr } from "./terminal";

const controller = new AbortController();
const terminal = new TerminalQuestions();
process.once("SIGINT", () => controller.abort());

const program = createProgram({
	cwd: process.cwd(),
	env: process.env,
	fs: new FileSystemService(),
	prompts: new PromptService(terminal.ask),
	signal: controller.signal,
});

program
	.parseAsync(process.argv)
	.catch((error: unknown) => {
		const message = error instanceof Error ? error.message : String(error);
		writeStderr(message);
		process.exitCode = 1;
	})
	.finally(() => terminal.close());
