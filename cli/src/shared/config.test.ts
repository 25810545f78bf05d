import { getConfig, parseEnvFile, resetConfig } from "./config";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

const CONFIG_KEYS = [
	"PHOTOSYNC_SERVER_URL",
	"PHOTOSYNC_API_KEY",
	"PHOTOSYNC_DEVICE_ID",
	"PHOTOSYNC_STATE_DIR",
	"DEBUG",
	"LOG_LEVEL",
	"REQUEST_TIMEOUT",
	"DOWNLOAD_TIMEOUT_MULTIPLIER",
	"RETRY_MAX",
	"RETRY_BASE_DELAY",
	"RETRY_MAX_DELAY",
	"UPLOAD_CONCURRENCY",
	"HASH_CONCURRENCY",
	"EXIST_BATCH_SIZE",
	"BULK_CHECK_BATCH_SIZE",
];

describe("config module", () => {
	const saved: Record<string, string | undefined> = {};

	beforeEach(() => {
		resetConfig();
		for (const key of CONFIG_KEYS) {
			saved[key] = process.env[key];
			delete process.env[key];
		}
	});

	afterEach(() => {
		for (const key of CONFIG_KEYS) {
			if (saved[key] === undefined) {
				delete process.env[key];
			} else {
				process.env[key] = saved[key];
			}
		}
		resetConfig();
	});

	test("getConfig returns default values", () => {
		const config = getConfig();
		expect(config.PHOTOSYNC_SERVER_URL).toBeUndefined();
		expect(config.DEBUG).toBe(false);
		expect(config.LOG_LEVEL).toBe("warn");
		expect(config.REQUEST_TIMEOUT).toBe(300_000);
		expect(config.DOWNLOAD_TIMEOUT_MULTIPLIER).toBe(2);
		expect(config.RETRY_MAX).toBe(3);
		expect(config.RETRY_BASE_DELAY).toBe(1000);
		expect(config.RETRY_MAX_DELAY).toBe(30_000);
		expect(config.EXIST_BATCH_SIZE).toBe(5000);
		expect(config.BULK_CHECK_BATCH_SIZE).toBe(5000);
		expect(config.UPLOAD_CONCURRENCY).toBeGreaterThanOrEqual(1);
		expect(config.PHOTOSYNC_DEVICE_ID.startsWith("photosync-")).toBe(true);
	});

	test("getConfig reads from process.env", () => {
		process.env.PHOTOSYNC_SERVER_URL = "http://photos.local:2283/";
		process.env.PHOTOSYNC_API_KEY = "test-secret";
		process.env.PHOTOSYNC_DEVICE_ID = "desk";
		process.env.LOG_LEVEL = "debug";
		process.env.REQUEST_TIMEOUT = "5m";
		process.env.RETRY_BASE_DELAY = "250ms";
		process.env.UPLOAD_CONCURRENCY = "3";

		const config = getConfig();

		expect(config.PHOTOSYNC_SERVER_URL).toBe("http://photos.local:2283");
		expect(config.PHOTOSYNC_API_KEY).toBe("test-secret");
		expect(config.PHOTOSYNC_DEVICE_ID).toBe("desk");
		expect(config.LOG_LEVEL).toBe("debug");
		expect(config.REQUEST_TIMEOUT).toBe(300_000);
		expect(config.RETRY_BASE_DELAY).toBe(250);
		expect(config.UPLOAD_CONCURRENCY).toBe(3);
	});

	test("empty values fall back to defaults", () => {
		process.env.LOG_LEVEL = "";
		process.env.RETRY_MAX = "";
		const config = getConfig();
		expect(config.LOG_LEVEL).toBe("warn");
		expect(config.RETRY_MAX).toBe(3);
	});

	test("rejects malformed durations", () => {
		process.env.REQUEST_TIMEOUT = "soon";
		expect(() => getConfig()).toThrow("Expected a duration");
	});

	test("rejects non-positive concurrency", () => {
		process.env.HASH_CONCURRENCY = "0";
		expect(() => getConfig()).toThrow();
	});

	test("getConfig caches config instance", () => {
		expect(getConfig()).toBe(getConfig());
	});

	test("resetConfig clears cached config", () => {
		const config1 = getConfig();
		resetConfig();
		const config2 = getConfig();
		expect(config1).not.toBe(config2);
		expect(config1.LOG_LEVEL).toBe(config2.LOG_LEVEL);
	});

	test("DEBUG accepts string 'true'", () => {
		process.env.DEBUG = "true";
		expect(getConfig().DEBUG).toBe(true);
	});
});

describe("parseEnvFile", () => {
	test("parses keys, quotes and comments", () => {
		const parsed = parseEnvFile(
			["# comment", "", "PHOTOSYNC_API_KEY='test-secret'", 'LOG_LEVEL="info"', "RETRY_MAX = 5", "BROKEN"].join(
				"\n",
			),
		);
		expect(parsed).toEqual({ PHOTOSYNC_API_KEY: "test-secret", LOG_LEVEL: "info", RETRY_MAX: "5" });
	});
});
