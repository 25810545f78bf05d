import { sha256File } from "../upload/Checksum";
import { copyFile, rename, rm, stat } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";

export type PlacementOutcome = { type: "exported"; path: string } | { type: "skippedIdentical"; path: string };

function errorCode(err: unknown): string | undefined {
	return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

export async function pathExists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch (err) {
		if (errorCode(err) === "ENOENT") {
			return false;
		}
		throw err;
	}
}

/**
 * Moves a file, copying and unlinking when source and destination are on different devices.
 */
export async function moveFile(from: string, to: string): Promise<void> {
	try {
		await rename(from, to);
	} catch (err) {
		if (errorCode(err) !== "EXDEV") {
			throw err;
		}
		await copyFile(from, to);
		await rm(from, { force: true });
	}
}

/**
 * First free path among `desired`, `{base}_2{ext}`, `{base}_3{ext}`, ...
 */
export async function uniquePath(desired: string): Promise<string> {
	if (!(await pathExists(desired))) {
		return desired;
	}
	const ext = extname(desired);
	const base = basename(desired, ext);
	const dir = dirname(desired);
	for (let i = 2; ; i++) {
		const candidate = join(dir, `${base}_${i}${ext}`);
		if (!(await pathExists(candidate))) {
			return candidate;
		}
	}
}

/**
 * Places a finished temp file at `desired` without ever overwriting: identical content already there
 * discards the temp file, different (or unreadable) content gets a numbered sibling.
 */
export async function placeTempFile(tempPath: string, desired: string): Promise<PlacementOutcome> {
	if (!(await pathExists(desired))) {
		await moveFile(tempPath, desired);
		return { type: "exported", path: desired };
	}

	const incoming = await sha256File(tempPath);
	const existing = await sha256File(desired).catch(() => undefined);
	if (existing && existing.size === incoming.size && existing.hashHex === incoming.hashHex) {
		await rm(tempPath, { force: true });
		return { type: "skippedIdentical", path: desired };
	}

	const alternative = await uniquePath(desired);
	await moveFile(tempPath, alternative);
	return { type: "exported", path: alternative };
}
