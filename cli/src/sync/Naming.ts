import { extname } from "node:path";

export const UNKNOWN_DATE_FOLDER = "Unknown Date";
const MIN_USABLE_YEAR = 1900;

/**
 * Short, filesystem-safe tag for an item id: the last path segment with everything but letters and
 * digits removed, at most 10 characters.
 */
export function shortId(id: string): string {
	const segments = id.split("/").filter(segment => segment.length > 0);
	const last = segments[segments.length - 1] ?? id;
	const cleaned = last.replace(/[^A-Za-z0-9]+/g, "").slice(0, 10);
	return cleaned.length > 0 ? cleaned : "asset";
}

/** Capture dates before 1900 are treated as missing. */
export function usableCaptureDate(date: Date | undefined): Date | undefined {
	if (!date || Number.isNaN(date.getTime()) || date.getFullYear() < MIN_USABLE_YEAR) {
		return;
	}
	return date;
}

function pad(n: number, width = 2): string {
	return n.toString().padStart(width, "0");
}

/**
 * Output folder for a capture date in local time: `YYYY/MM/DD`, or `Unknown Date`.
 */
export function dateFolder(date: Date | undefined): string {
	const usable = usableCaptureDate(date);
	if (!usable) {
		return UNKNOWN_DATE_FOLDER;
	}
	return `${pad(usable.getFullYear(), 4)}/${pad(usable.getMonth() + 1)}/${pad(usable.getDate())}`;
}

/**
 * Base file name: `yyyy-MM-dd_HH-mm-ss_{shortId}` in local time, or `unknown_{shortId}`.
 */
export function baseFileName(date: Date | undefined, id: string): string {
	const usable = usableCaptureDate(date);
	if (!usable) {
		return `unknown_${shortId(id)}`;
	}
	const day = `${pad(usable.getFullYear(), 4)}-${pad(usable.getMonth() + 1)}-${pad(usable.getDate())}`;
	const time = `${pad(usable.getHours())}-${pad(usable.getMinutes())}-${pad(usable.getSeconds())}`;
	return `${day}_${time}_${shortId(id)}`;
}

/**
 * Lower-cased extension of a resource name, including the dot. Falls back when the name has none.
 */
export function extensionOf(filename: string, fallback: string): string {
	const ext = extname(filename).toLowerCase();
	return ext.length > 1 ? ext : fallback;
}
