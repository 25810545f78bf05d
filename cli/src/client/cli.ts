// photosync CLI
// Usage: tsx src/client/cli.ts [command]

import { errorMessage, getLog, logError } from "../shared/logger";
import {
	registerFailedCommands,
	registerFilesCommand,
	registerRunCommand,
	registerServerCommands,
	registerSessionCommands,
} from "./commands";
import { pathToFileURL } from "node:url";
import { Command } from "commander";

const logger = getLog(import.meta);

/**
 * Builds the command tree. Nothing runs until the program is parsed.
 */
export function createProgram(): Command {
	const program = new Command();
	program.name("photosync").description("Export a photo library to folders and a self-hosted server").version("0.1.0");

	registerRunCommand(program);
	registerFilesCommand(program);
	registerServerCommands(program);
	registerSessionCommands(program);
	registerFailedCommands(program);

	return program;
}

function isEntryPoint(): boolean {
	const script = process.argv[1];
	return script !== undefined && pathToFileURL(script).href === import.meta.url;
}

if (isEntryPoint()) {
	createProgram()
		.parseAsync()
		.catch((err: unknown) => {
			logError(logger, err, "command failed");
			console.error(`Error: ${errorMessage(err)}`);
			process.exitCode = 1;
		});
}
