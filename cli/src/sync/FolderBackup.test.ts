import { createServer, type ReferenceServer } from "../reference-server/server";
import { FOLDER_TEMP_DIR, type FolderBackupOptions, runFolderBackup, scanFolders } from "./FolderBackup";
import { createRunControl } from "./RunControl";
import { SyncSetupError } from "./SyncOrchestrator";
import type { ProgressEvent } from "./Types";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

describe("FolderBackup", () => {
	let dir: string;
	let src: string;
	let dest: string;
	let events: Array<ProgressEvent>;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "photosync-files-"));
		src = join(dir, "src");
		dest = join(dir, "dest");
		events = [];
		await mkdir(join(src, "sub"), { recursive: true });
		await writeFile(join(src, "a.txt"), "alpha");
		await writeFile(join(src, "sub", "b.txt"), "beta");
		await writeFile(join(src, ".hidden"), "secret");
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	function options(overrides: Partial<FolderBackupOptions> = {}): FolderBackupOptions {
		return {
			sources: [src],
			destination: dest,
			backupMode: "smartIncremental",
			includeHiddenFiles: false,
			followSymlinks: false,
			dryRun: false,
			...overrides,
		};
	}

	function listener(event: ProgressEvent): void {
		events.push(event);
	}

	function messages(): Array<string> {
		return events.flatMap(e => (e.type === "message" ? [e.text] : []));
	}

	test("copies visible files and leaves no temp directory behind", async () => {
		const result = await runFolderBackup(options(), listener, createRunControl());

		expect(result).toMatchObject({ scanned: 2, copied: 2, skipped: 0, errorCount: 0 });
		expect(await readFile(join(dest, "a.txt"), "utf-8")).toBe("alpha");
		expect(await readFile(join(dest, "sub", "b.txt"), "utf-8")).toBe("beta");
		expect(existsSync(join(dest, ".hidden"))).toBe(false);
		expect(existsSync(join(dest, FOLDER_TEMP_DIR))).toBe(false);
		expect(events[0]).toEqual({ type: "fileScanning" });
		expect(events).toContainEqual({ type: "fileWillCopy", total: 2 });
		expect(events).toContainEqual({ type: "fileCopying", index: 2, total: 2, relPath: "sub/b.txt" });
	});

	test("skips unchanged files on the next run", async () => {
		await runFolderBackup(options(), listener, createRunControl());

		const result = await runFolderBackup(options(), listener, createRunControl());

		expect(result).toMatchObject({ scanned: 2, copied: 0, skipped: 2 });
	});

	test("mirror mode removes copies of deleted sources", async () => {
		await runFolderBackup(options({ backupMode: "mirror" }), listener, createRunControl());
		await rm(join(src, "sub", "b.txt"));

		const result = await runFolderBackup(options({ backupMode: "mirror" }), listener, createRunControl());

		expect(result).toMatchObject({ scanned: 1, skipped: 1, deleted: 1 });
		expect(existsSync(join(dest, "sub", "b.txt"))).toBe(false);
		expect(messages()).toContain("Mirror: deleted sub/b.txt");
	});

	test("a dry run counts copies without writing them", async () => {
		const result = await runFolderBackup(options({ dryRun: true }), listener, createRunControl());

		expect(result.copied).toBe(2);
		expect(existsSync(dest)).toBe(false);
	});

	test("stops before the first file when paused", async () => {
		const result = await runFolderBackup(options(), listener, createRunControl("paused"));

		expect(result.scanned).toBe(0);
		expect(messages()).toContain("Files: pause requested; stopping after scan");
	});

	test("refuses to run without a destination or upload target", async () => {
		const run = runFolderBackup(options({ destination: undefined }), listener, createRunControl());

		await expect(run).rejects.toBeInstanceOf(SyncSetupError);
		await expect(run).rejects.toThrow("Nothing to back up to");
		expect(events).toEqual([]);
	});

	test("hidden files and symlinks are opt-in", async () => {
		await symlink(join(src, "a.txt"), join(src, "link.txt"));

		const plain = await scanFolders([src], { includeHiddenFiles: false, followSymlinks: false });
		expect(plain.map(file => file.relPath).sort()).toEqual(["a.txt", "sub/b.txt"]);

		const everything = await scanFolders([src], { includeHiddenFiles: true, followSymlinks: true });
		expect(everything.map(file => file.relPath).sort()).toEqual([".hidden", "a.txt", "link.txt", "sub/b.txt"]);
	});

	describe("with a remote store", () => {
		let server: ReferenceServer;

		beforeEach(async () => {
			server = await createServer({ port: 0, apiKey: "test-secret" });
		});

		afterEach(async () => {
			await server.close();
		});

		function uploadOptions(updateChanged = false): FolderBackupOptions {
			return options({
				destination: undefined,
				upload: { serverUrl: server.url, apiKey: "test-secret", deviceId: "desk", existBatchSize: 1, updateChanged },
			});
		}

		function deviceAssetIds(): Array<string> {
			return [...server.store.assets.values()].map(asset => asset.deviceAssetId).sort();
		}

		test("uploads files under their relative path", async () => {
			const result = await runFolderBackup(uploadOptions(), listener, createRunControl());

			expect(result).toMatchObject({ uploaded: 2, errorCount: 0 });
			expect(deviceAssetIds()).toEqual(["file:a.txt", "file:sub/b.txt"]);
			expect(events.filter(e => e.type === "existenceCheck")).toEqual([
				{ type: "existenceCheck", checked: 1, total: 2 },
				{ type: "existenceCheck", checked: 2, total: 2 },
			]);
		});

		test("skips files the server already has", async () => {
			await runFolderBackup(uploadOptions(), listener, createRunControl());

			const result = await runFolderBackup(uploadOptions(), listener, createRunControl());

			expect(result).toMatchObject({ uploaded: 0, skipped: 2 });
		});

		test("replaces existing files when asked to", async () => {
			await runFolderBackup(uploadOptions(), listener, createRunControl());
			const before = [...server.store.assets.keys()];

			const result = await runFolderBackup(uploadOptions(true), listener, createRunControl());

			expect(result).toMatchObject({ uploaded: 2, replaced: 2, errorCount: 0 });
			expect(deviceAssetIds()).toEqual(["file:a.txt", "file:sub/b.txt"]);
			expect([...server.store.assets.keys()].some(id => before.includes(id))).toBe(false);
		});
	});
});
