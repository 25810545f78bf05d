import { baseFileName, dateFolder, extensionOf, shortId, UNKNOWN_DATE_FOLDER } from "./Naming";
import { describe, expect, test } from "vitest";

describe("Naming", () => {
	test("shortId keeps letters and digits of the last segment", () => {
		expect(shortId("Trips/IMG_0001")).toBe("IMG0001");
		expect(shortId("2F1C-77AB-4410-9C0D")).toBe("2F1C77AB44");
		expect(shortId("___")).toBe("asset");
	});

	test("dateFolder uses local calendar parts", () => {
		expect(dateFolder(new Date(2024, 2, 5, 23, 59, 0))).toBe("2024/03/05");
	});

	test("dateFolder falls back for missing or ancient dates", () => {
		expect(dateFolder(undefined)).toBe(UNKNOWN_DATE_FOLDER);
		expect(dateFolder(new Date(1899, 11, 31))).toBe("Unknown Date");
		expect(dateFolder(new Date(Number.NaN))).toBe("Unknown Date");
	});

	test("baseFileName formats the capture time", () => {
		expect(baseFileName(new Date(2024, 2, 5, 7, 8, 9), "Trips/IMG_0001")).toBe("2024-03-05_07-08-09_IMG0001");
		expect(baseFileName(undefined, "Trips/IMG_0001")).toBe("unknown_IMG0001");
		expect(baseFileName(new Date(1850, 0, 1), "x")).toBe("unknown_x");
	});

	test("extensionOf lower-cases and falls back", () => {
		expect(extensionOf("IMG_0001.HEIC", ".bin")).toBe(".heic");
		expect(extensionOf("README", ".bin")).toBe(".bin");
	});
});
