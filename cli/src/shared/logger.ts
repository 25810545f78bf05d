import { getConfig } from "./config";
import pino from "pino";
import { z } from "zod";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type Logger = pino.Logger;

// =============================================================================
// Module name extraction
// =============================================================================

export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const lastSlashIndex = moduleUrl.lastIndexOf("/");
	const fileNameWithExtension = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
	const parts = fileNameWithExtension.split(".");
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

// =============================================================================
// Pretty formatting (inline, no transport needed)
// =============================================================================

const LEVEL_COLORS: Record<number, string> = {
	10: "\x1b[90m", // trace - gray
	20: "\x1b[36m", // debug - cyan
	30: "\x1b[32m", // info - green
	40: "\x1b[33m", // warn - yellow
	50: "\x1b[31m", // error - red
	60: "\x1b[35m", // fatal - magenta
};

const LEVEL_NAMES: Record<number, string> = {
	10: "TRACE",
	20: "DEBUG",
	30: "INFO",
	40: "WARN",
	50: "ERROR",
	60: "FATAL",
};

const RESET = "\x1b[0m";

const LogLineSchema = z.object({
	time: z.number(),
	level: z.number(),
	module: z.string().optional(),
	msg: z.string().optional(),
	err: z.union([z.object({ message: z.string().optional() }).passthrough(), z.string()]).optional(),
});

function formatTime(timestamp: number): string {
	const date = new Date(timestamp);
	const pad = (n: number) => n.toString().padStart(2, "0");
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Renders one serialized pino record as a single colored line.
 * Returns undefined when the chunk is not a pino record.
 */
export function formatLogLine(chunk: string): string | undefined {
	let raw: unknown;
	try {
		raw = JSON.parse(chunk);
	} catch {
		return;
	}
	const parsed = LogLineSchema.safeParse(raw);
	if (!parsed.success) {
		return;
	}
	const record = parsed.data;
	const color = LEVEL_COLORS[record.level] ?? "";
	const levelName = LEVEL_NAMES[record.level] ?? "LOG";
	const moduleName = record.module ?? "unknown";
	const errText = typeof record.err === "string" ? record.err : record.err?.message;
	const suffix = errText ? ` (${errText})` : "";
	return `${color}[${formatTime(record.time)}] ${levelName}${RESET} ${moduleName} - ${record.msg ?? ""}${suffix}\n`;
}

function prettyDestination(): pino.DestinationStream {
	return {
		write(chunk: string): void {
			process.stdout.write(formatLogLine(chunk) ?? chunk);
		},
	};
}

// =============================================================================
// Logger creation
// =============================================================================

let rootLogger: pino.Logger | undefined;

function getRootLogger(): pino.Logger {
	if (!rootLogger) {
		const config = getConfig();
		rootLogger = pino(
			{
				level: config.DEBUG ? "debug" : config.LOG_LEVEL,
			},
			prettyDestination(),
		);
	}
	return rootLogger;
}

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * To use in a module, call `getLog(import.meta)` near the top of the file (after imports).
 *
 * @param module the module meta or module name
 */
export function getLog(module: string | ImportMeta): Logger {
	return getRootLogger().child({ module: getModuleName(module) });
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Log an error with proper formatting
 */
export function logError(logger: Logger, err: unknown, message: string): void {
	if (err instanceof Error) {
		logger.error({ err }, message);
	} else {
		logger.error({ err: String(err) }, message);
	}
}

/**
 * Human-readable message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Reset the logger (useful for testing)
 */
export function resetLogger(): void {
	rootLogger = undefined;
}
