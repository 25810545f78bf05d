import { readFileSync } from "node:fs";
import { cpus, homedir, hostname } from "node:os";
import { join } from "node:path";
import type { StringValue } from "ms";
import ms from "ms";
import { z } from "zod";

/**
 * Boolean schema that accepts string "true"/"false" or boolean values
 */
const BooleanSchema = z.union([z.boolean(), z.string().transform(s => s === "true")]).default(false);

const DURATION_PATTERN = /^\d+(\.\d+)?\s*(ms|s|sec|secs|m|min|mins|h|hr|hrs|d|w|y)?$/i;

function isDuration(value: string): value is StringValue {
	return DURATION_PATTERN.test(value);
}

/**
 * Duration schema ("300s", "5m", "1500") resolved to milliseconds.
 */
function durationSchema(defaultValue: StringValue) {
	return z
		.string()
		.refine(isDuration, { message: "Expected a duration such as 500ms, 30s or 5m" })
		.default(defaultValue)
		.transform(value => ms(value));
}

function positiveIntSchema(defaultValue: number) {
	return z.coerce.number().int().positive().default(defaultValue);
}

const defaultConcurrency = Math.max(1, cpus().length - 1);

/**
 * Configuration schema definition
 */
const configSchema = {
	// Immich-compatible server URL ("/api" is appended by the client when missing)
	PHOTOSYNC_SERVER_URL: z
		.string()
		.url()
		.optional()
		.transform(url => url?.replace(/\/+$/, "")),

	// API key sent as x-api-key
	PHOTOSYNC_API_KEY: z.string().optional(),

	// Device id reported with every upload; stable across runs on one machine
	PHOTOSYNC_DEVICE_ID: z.string().min(1).default(`photosync-${hostname()}`),

	// Session state, failed-upload records
	PHOTOSYNC_STATE_DIR: z.string().default(join(homedir(), ".photosync")),

	// Enable debug logging
	DEBUG: BooleanSchema,

	// Log level for pino logger
	LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("warn"),

	REQUEST_TIMEOUT: durationSchema("300s"),
	DOWNLOAD_TIMEOUT_MULTIPLIER: z.coerce.number().min(1).default(2),

	RETRY_MAX: z.coerce.number().int().min(0).default(3),
	RETRY_BASE_DELAY: durationSchema("1s"),
	RETRY_MAX_DELAY: durationSchema("30s"),

	UPLOAD_CONCURRENCY: positiveIntSchema(defaultConcurrency),
	HASH_CONCURRENCY: positiveIntSchema(defaultConcurrency),
	EXIST_BATCH_SIZE: positiveIntSchema(5000),
	BULK_CHECK_BATCH_SIZE: positiveIntSchema(5000),
};

/**
 * Infer the config type from the schema
 */
type ConfigSchema = typeof configSchema;
export type Config = {
	[K in keyof ConfigSchema]: z.infer<ConfigSchema[K]>;
};

/**
 * Parse a .env file content into key-value pairs.
 * Supports basic .env format: KEY=value, with optional quotes.
 */
export function parseEnvFile(content: string): Record<string, string> {
	const result: Record<string, string> = {};

	for (const line of content.split("\n")) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) {
			continue;
		}

		const eqIndex = trimmed.indexOf("=");
		if (eqIndex === -1) {
			continue;
		}

		const key = trimmed.slice(0, eqIndex).trim();
		let value = trimmed.slice(eqIndex + 1).trim();

		if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
			value = value.slice(1, -1);
		}

		result[key] = value;
	}

	return result;
}

function loadEnvFile(path: string): Record<string, string> {
	let content: string;
	try {
		content = readFileSync(path, "utf-8");
	} catch {
		// Missing file contributes nothing
		return {};
	}
	return parseEnvFile(content);
}

/**
 * Load environment variables from .env files.
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env in current working directory
 * 3. ~/.photosync/.env
 */
function loadEnvFiles(): Record<string, string> {
	const userEnv = loadEnvFile(join(homedir(), ".photosync", ".env"));
	const localEnv = loadEnvFile(join(process.cwd(), ".env"));
	return { ...userEnv, ...localEnv };
}

/**
 * Parse environment variables and return validated config
 */
function createConfig(): Config {
	const envFromFiles = loadEnvFiles();

	function getEnvValue(key: string): string | undefined {
		const envValue = process.env[key] ?? envFromFiles[key];
		// Treat empty string as undefined so defaults apply
		return envValue === "" ? undefined : envValue;
	}

	return {
		PHOTOSYNC_SERVER_URL: configSchema.PHOTOSYNC_SERVER_URL.parse(getEnvValue("PHOTOSYNC_SERVER_URL")),
		PHOTOSYNC_API_KEY: configSchema.PHOTOSYNC_API_KEY.parse(getEnvValue("PHOTOSYNC_API_KEY")),
		PHOTOSYNC_DEVICE_ID: configSchema.PHOTOSYNC_DEVICE_ID.parse(getEnvValue("PHOTOSYNC_DEVICE_ID")),
		PHOTOSYNC_STATE_DIR: configSchema.PHOTOSYNC_STATE_DIR.parse(getEnvValue("PHOTOSYNC_STATE_DIR")),
		DEBUG: configSchema.DEBUG.parse(getEnvValue("DEBUG")),
		LOG_LEVEL: configSchema.LOG_LEVEL.parse(getEnvValue("LOG_LEVEL")),
		REQUEST_TIMEOUT: configSchema.REQUEST_TIMEOUT.parse(getEnvValue("REQUEST_TIMEOUT")),
		DOWNLOAD_TIMEOUT_MULTIPLIER: configSchema.DOWNLOAD_TIMEOUT_MULTIPLIER.parse(
			getEnvValue("DOWNLOAD_TIMEOUT_MULTIPLIER"),
		),
		RETRY_MAX: configSchema.RETRY_MAX.parse(getEnvValue("RETRY_MAX")),
		RETRY_BASE_DELAY: configSchema.RETRY_BASE_DELAY.parse(getEnvValue("RETRY_BASE_DELAY")),
		RETRY_MAX_DELAY: configSchema.RETRY_MAX_DELAY.parse(getEnvValue("RETRY_MAX_DELAY")),
		UPLOAD_CONCURRENCY: configSchema.UPLOAD_CONCURRENCY.parse(getEnvValue("UPLOAD_CONCURRENCY")),
		HASH_CONCURRENCY: configSchema.HASH_CONCURRENCY.parse(getEnvValue("HASH_CONCURRENCY")),
		EXIST_BATCH_SIZE: configSchema.EXIST_BATCH_SIZE.parse(getEnvValue("EXIST_BATCH_SIZE")),
		BULK_CHECK_BATCH_SIZE: configSchema.BULK_CHECK_BATCH_SIZE.parse(getEnvValue("BULK_CHECK_BATCH_SIZE")),
	};
}

let currentConfig: Config | undefined;

/**
 * Gets the current configuration object.
 * Config is created on first access and cached.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Resets the config cache (useful for testing)
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
