// Shared Command Helpers
// Server target resolution, interrupt handling and the error exit used by every command

import type { Config } from "../../shared/config";
import { errorMessage } from "../../shared/logger";
import type { RunControl } from "../../sync/RunControl";

/** The part of `process` the interrupt handler listens on */
export interface SignalSource {
	on(event: "SIGINT", listener: () => void): unknown;
	off(event: "SIGINT", listener: () => void): unknown;
}

export interface ServerTarget {
	serverUrl: string;
	apiKey: string;
}

/**
 * Server URL and API key from the command line, falling back to the configuration.
 */
export function resolveServerTarget(
	flags: { server?: string; apiKey?: string },
	config: Pick<Config, "PHOTOSYNC_SERVER_URL" | "PHOTOSYNC_API_KEY">,
): ServerTarget {
	const serverUrl = flags.server ?? config.PHOTOSYNC_SERVER_URL;
	const apiKey = flags.apiKey ?? config.PHOTOSYNC_API_KEY;
	if (!serverUrl) {
		throw new Error("No server configured: pass --server or set PHOTOSYNC_SERVER_URL");
	}
	if (!apiKey) {
		throw new Error("No API key configured: pass --api-key or set PHOTOSYNC_API_KEY");
	}
	return { serverUrl, apiKey };
}

/**
 * First Ctrl-C pauses after the current item, the second cancels. Returns a detach function.
 */
export function attachInterruptHandler(
	control: RunControl,
	emitter: SignalSource = process,
	write: (line: string) => void = line => console.log(line),
): () => void {
	function onInterrupt(): void {
		if (control.state() === "running") {
			control.pause();
			write("Pausing after the current item (Ctrl-C again to cancel)");
			return;
		}
		control.cancel();
		write("Cancelling");
	}
	emitter.on("SIGINT", onInterrupt);
	return () => {
		emitter.off("SIGINT", onInterrupt);
	};
}

/**
 * Wraps a command action so failures print one line and exit non-zero.
 */
export function withErrorExit<Args extends Array<unknown>>(
	action: (...args: Args) => Promise<void>,
): (...args: Args) => Promise<void> {
	return async (...args: Args) => {
		try {
			await action(...args);
		} catch (error) {
			console.error(`Error: ${errorMessage(error)}`);
			process.exit(1);
		}
	};
}
