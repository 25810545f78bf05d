import {
	addJitter,
	calculateBackoffDelay,
	classifyError,
	DEFAULT_RETRY_CONFIGURATION,
	ExportError,
	retryDelay,
	StoppedByUserError,
} from "./Retry";
import { describe, expect, it } from "vitest";

function codedError(message: string, code: string): Error {
	return Object.assign(new Error(message), { code });
}

describe("Retry", () => {
	describe("calculateBackoffDelay", () => {
		it("returns the base delay for the first attempt", () => {
			expect(calculateBackoffDelay(0, 1000, 30000)).toBe(1000);
		});

		it("doubles per attempt", () => {
			expect(calculateBackoffDelay(1, 1000, 30000)).toBe(2000);
			expect(calculateBackoffDelay(2, 1000, 30000)).toBe(4000);
			expect(calculateBackoffDelay(3, 1000, 30000)).toBe(8000);
		});

		it("caps at the max delay", () => {
			expect(calculateBackoffDelay(5, 1000, 30000)).toBe(30000);
			expect(calculateBackoffDelay(20, 1000, 30000)).toBe(30000);
		});
	});

	describe("addJitter", () => {
		it("stays within a quarter of the delay", () => {
			for (let i = 0; i < 100; i++) {
				const jitter = addJitter(1000);
				expect(jitter).toBeGreaterThanOrEqual(0);
				expect(jitter).toBeLessThanOrEqual(250);
			}
		});

		it("uses the injected random source", () => {
			expect(addJitter(1000, () => 0.5)).toBe(125);
			expect(addJitter(0, () => 0.9)).toBe(0);
		});
	});

	describe("retryDelay", () => {
		it("adds jitter on top of the capped delay", () => {
			expect(retryDelay(1, DEFAULT_RETRY_CONFIGURATION, () => 1)).toBe(2500);
			expect(retryDelay(10, DEFAULT_RETRY_CONFIGURATION, () => 1)).toBe(37500);
		});

		it("omits jitter when disabled", () => {
			expect(retryDelay(2, { ...DEFAULT_RETRY_CONFIGURATION, jitter: false }, () => 1)).toBe(4000);
		});
	});

	describe("classifyError", () => {
		it("passes classified errors through", () => {
			const timeout = new ExportError("timeout", "slow");
			const stopped = new StoppedByUserError();
			expect(classifyError(timeout)).toBe(timeout);
			expect(classifyError(stopped)).toBe(stopped);
		});

		it("treats network codes as retryable fetch failures", () => {
			const classified = classifyError(codedError("socket hang up", "ECONNRESET"));
			expect(classified).toBeInstanceOf(ExportError);
			if (classified instanceof ExportError) {
				expect(classified.kind).toBe("remoteFetchFailed");
				expect(classified.retryable).toBe(true);
			}
		});

		it("finds codes on the cause chain", () => {
			const wrapped = new Error("fetch failed", { cause: codedError("getaddrinfo", "ENOTFOUND") });
			const classified = classifyError(wrapped);
			expect(classified instanceof ExportError && classified.kind).toBe("remoteFetchFailed");
		});

		it("treats missing files as unavailable", () => {
			const classified = classifyError(codedError("no such file", "ENOENT"));
			expect(classified instanceof ExportError && classified.kind).toBe("unavailable");
			expect(classified instanceof ExportError && classified.retryable).toBe(false);
		});

		it("maps aborts to cancelled and everything else to failed", () => {
			const abort = new Error("aborted");
			abort.name = "AbortError";
			const cancelled = classifyError(abort);
			expect(cancelled instanceof ExportError && cancelled.kind).toBe("cancelled");
			expect(cancelled.message).toBe("aborted");
			const failed = classifyError(new Error("bad pixels"));
			expect(failed instanceof ExportError && failed.kind).toBe("failed");
			const weird = classifyError("boom");
			expect(weird.message).toBe("boom");
		});
	});
});
