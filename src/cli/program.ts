import { Command } from "commander";
import { TOOL_NAME } from "../constants";
import {
	dataviewLimitsCommand,
	dedupCommand,
	stripFrontmatterCommand,
	unclobberCommand,
} from "./commands";
import type { CliDeps } from "./executeTool";

export const VERSION = "0.3.0";

export function createProgram(deps: CliDeps): Command {
	const program = new Command();

	program
		.name(TOOL_NAME)
		.description("Maintenance tools for a Markdown notes vault")
		.version(VERSION);

	program.addCommand(unclobberCommand(deps));
	program.addCommand(stripFrontmatterCommand(deps));
	program.addCommand(dedupCommand(deps));
	program.addCommand(dataviewLimitsCommand(deps));

	return program;
}
