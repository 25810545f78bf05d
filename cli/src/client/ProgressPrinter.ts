import { getLog } from "../shared/logger";
import type { ProgressEvent, ProgressListener } from "../sync/Types";
import ms from "ms";

const log = getLog(import.meta);

/**
 * One console line for a progress event, or undefined for events too chatty to print.
 */
export function formatProgressEvent(event: ProgressEvent): string | undefined {
	switch (event.type) {
		case "scanning":
			return "Scanning library...";
		case "willExport":
			return `Found ${event.total} item(s) to process`;
		case "exporting":
			return `[${event.index}/${event.total}] ${event.baseName} (${event.kind})`;
		case "message":
			return event.text;
		case "downloading":
			return;
		case "retrying":
			return `Retrying ${event.baseName} (attempt ${event.attempt}/${event.maxAttempts}) in ${ms(event.delayMs)}: ${event.reason}`;
		case "existenceCheck":
			return `Remote: checked ${event.checked}/${event.total} for existing assets`;
		case "paused":
			return `Paused at ${event.at}/${event.total}; run again with --resume to continue`;
		case "fileScanning":
			return "Scanning folders...";
		case "fileWillCopy":
			return `Found ${event.total} file(s)`;
		case "fileCopying":
			return `[${event.index}/${event.total}] ${event.relPath}`;
	}
}

export interface ProgressPrinterOptions {
	write?: (line: string) => void;
	/** Prints every existence-check update instead of every tenth */
	verbose?: boolean;
}

/**
 * Progress listener for the terminal. Lines starting with `ERROR` go to the error log instead.
 */
export function createProgressPrinter(options: ProgressPrinterOptions = {}): ProgressListener {
	const write = options.write ?? ((line: string) => console.log(line));
	let existenceUpdates = 0;

	return event => {
		if (event.type === "existenceCheck" && !options.verbose && event.checked < event.total) {
			existenceUpdates++;
			if (existenceUpdates % 10 !== 1) {
				return;
			}
		}
		const line = formatProgressEvent(event);
		if (line === undefined) {
			return;
		}
		if (line.startsWith("ERROR")) {
			log.error(line);
			return;
		}
		write(line);
	};
}
