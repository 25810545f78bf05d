import { openManifest } from "../manifest/ManifestDatabase";
import { createServer, type ReferenceServer } from "../reference-server/server";
import { type MemoryItemInit, createMemorySource } from "./AssetSource.mock";
import { baseFileName, dateFolder } from "./Naming";
import { createRunControl } from "./RunControl";
import { createSessionStore, type RunSession } from "./Session";
import {
	buildExistBatches,
	createSyncOrchestrator,
	planVariants,
	selectCandidates,
	SyncSetupError,
} from "./SyncOrchestrator";
import type { AssetSource, ProgressEvent, SyncOptions } from "./Types";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, posix } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

function capturedAt(i: number): Date {
	return new Date(2024, 2, 5, 10, 0, i);
}

function photos(count: number, extra: Partial<MemoryItemInit> = {}): Array<MemoryItemInit> {
	return Array.from({ length: count }, (_, i) => ({ id: `p${i}`, createdAt: capturedAt(i), ...extra }));
}

function outputPath(id: string, date: Date, suffix = ".jpg"): string {
	return posix.join(dateFolder(date), `${baseFileName(date, id)}${suffix}`);
}

describe("SyncOrchestrator", () => {
	let dir: string;
	let dest: string;
	let events: Array<ProgressEvent>;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "photosync-orchestrator-"));
		dest = join(dir, "dest");
		events = [];
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	function options(overrides: Partial<SyncOptions> = {}): SyncOptions {
		return {
			mode: "originals",
			media: "all",
			sortOrder: "oldest",
			albumScope: "all",
			backupMode: "smartIncremental",
			includeAdjustmentData: false,
			dryRun: false,
			folderDestination: dest,
			retry: { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 5, jitter: false },
			requestTimeoutMs: 5000,
			downloadTimeoutMultiplier: 2,
			tempDir: join(dir, "tmp"),
			stateDir: join(dir, "state"),
			...overrides,
		};
	}

	function orchestrator(source: AssetSource) {
		return createSyncOrchestrator({
			source,
			exportTiming: { tickMs: 5, sleep: () => Promise.resolve(), random: () => 0 },
		});
	}

	function listener(event: ProgressEvent): void {
		events.push(event);
	}

	function messages(): Array<string> {
		return events.flatMap(e => (e.type === "message" ? [e.text] : []));
	}

	test(
		"exports every item once and skips all of them on the next run",
		async () => {
			const source = createMemorySource(photos(500));

			const first = await orchestrator(source).run(options(), listener, createRunControl());
			expect(first).toMatchObject({ attempted: 500, completed: 500, skipped: 0, errorCount: 0 });
			expect(await readFile(join(dest, outputPath("p7", capturedAt(7))), "utf-8")).toBe("content of p7");

			const manifest = await openManifest(dest);
			try {
				expect(await manifest.keysNotTouchedByRun("another-run", "photo:")).toHaveLength(500);
			} finally {
				await manifest.close();
			}

			const second = await orchestrator(source).run(options(), listener, createRunControl());
			expect(second).toMatchObject({ attempted: 500, completed: 0, skipped: 500, errorCount: 0 });
			expect(source.fetches).toHaveLength(500);
		},
		120_000,
	);

	test("mirror mode deletes outputs of items no longer in the library", async () => {
		const specs = photos(3);
		await orchestrator(createMemorySource(specs)).run(options({ backupMode: "mirror" }), listener, createRunControl());
		const removed = outputPath("p1", capturedAt(1));
		expect(existsSync(join(dest, removed))).toBe(true);

		const result = await orchestrator(createMemorySource([specs[0], specs[2]])).run(
			options({ backupMode: "mirror" }),
			listener,
			createRunControl(),
		);

		expect(result.mirrorDeleted).toBe(1);
		expect(existsSync(join(dest, removed))).toBe(false);
		expect(existsSync(join(dest, outputPath("p0", capturedAt(0))))).toBe(true);
		expect(messages()).toContain(`Mirror: deleted ${removed}`);
	});

	test("incremental mode keeps outputs of removed items", async () => {
		const specs = photos(2);
		await orchestrator(createMemorySource(specs)).run(options(), listener, createRunControl());

		const result = await orchestrator(createMemorySource([specs[0]])).run(options(), listener, createRunControl());

		expect(result.mirrorDeleted).toBe(0);
		expect(existsSync(join(dest, outputPath("p1", capturedAt(1))))).toBe(true);
	});

	test("re-exports an item whose modification date changed", async () => {
		const specs = photos(1);
		await orchestrator(createMemorySource(specs)).run(options(), listener, createRunControl());

		const edited = createMemorySource([{ ...specs[0], modifiedAt: new Date(2024, 5, 1), contents: { original: "v2" } }]);
		const result = await orchestrator(edited).run(options(), listener, createRunControl());

		expect(result.completed).toBe(1);
		expect(await readFile(join(dest, outputPath("p0", capturedAt(0), "_2.jpg")), "utf-8")).toBe("v2");
	});

	test("a paused run saves a session that the next run resumes from", async () => {
		const source = createMemorySource(photos(5));
		const control = createRunControl();
		const pauseAtSecond = (event: ProgressEvent) => {
			events.push(event);
			if (event.type === "exporting" && event.index === 2) {
				control.pause();
			}
		};

		const paused = await orchestrator(source).run(options(), pauseAtSecond, control);

		expect(paused).toMatchObject({ attempted: 2, completed: 2, wasPaused: true, pauseIndex: 2 });
		expect(events).toContainEqual({ type: "paused", at: 2, total: 5 });
		const sessions = createSessionStore(join(dir, "state"));
		const session = await sessions.load();
		expect(session?.processedAssetIds).toEqual(["p0", "p1"]);
		expect(session?.totalAssetsAtPause).toBe(5);

		events = [];
		const resumed = await orchestrator(source).run(options(), listener, createRunControl(), session);

		expect(resumed).toMatchObject({ attempted: 3, completed: 3, wasPaused: false });
		expect([...resumed.processedIds].sort()).toEqual(["p0", "p1", "p2", "p3", "p4"]);
		expect(messages()).toContain("Resuming: 3 remaining photo(s)");
		expect(await sessions.load()).toBeUndefined();
	});

	test("refuses a session paused under another configuration", async () => {
		const session: RunSession = {
			sessionId: "s1",
			startedAt: new Date(2024, 0, 1),
			lastUpdatedAt: new Date(2024, 0, 1),
			processedAssetIds: [],
			errorAssetIds: [],
			configSnapshot: {
				mode: "edited",
				media: "all",
				sortOrder: "oldest",
				backupMode: "smartIncremental",
				folderDestination: dest,
			},
			stats: { uploaded: 0, skipped: 0, error: 0 },
		};

		await expect(
			orchestrator(createMemorySource([])).run(options(), listener, createRunControl(), session),
		).rejects.toBeInstanceOf(SyncSetupError);
	});

	test("refuses to run without a destination or upload target", async () => {
		await expect(
			orchestrator(createMemorySource([])).run(options({ folderDestination: undefined }), listener, createRunControl()),
		).rejects.toThrow("Nothing to sync to");
	});

	test("retries transient failures and completes the item", async () => {
		const source = createMemorySource(photos(1));
		source.failNext("p0", "original", Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }), 2);

		const result = await orchestrator(source).run(options(), listener, createRunControl());

		expect(result).toMatchObject({ completed: 1, errorCount: 0 });
		const retries = events.filter(e => e.type === "retrying");
		expect(retries.map(e => (e.type === "retrying" ? e.attempt : 0))).toEqual([1, 2]);
		expect(source.fetches).toEqual(["p0:original", "p0:original", "p0:original"]);
	});

	test("a permanent failure counts the item as completed with an error", async () => {
		const source = createMemorySource(photos(2));
		source.failNext("p1", "original", Object.assign(new Error("gone"), { code: "ENOENT" }));

		const result = await orchestrator(source).run(options(), listener, createRunControl());

		expect(result).toMatchObject({ attempted: 2, completed: 2, errorCount: 1, errorIds: ["p1"] });
		expect(messages()).toContain("ERROR processing original: gone");
		expect(events.some(e => e.type === "retrying")).toBe(false);
	});

	test("a cancelled run stops before the next export", async () => {
		const source = createMemorySource(photos(4));
		const control = createRunControl();
		const cancelAtSecond = (event: ProgressEvent) => {
			events.push(event);
			if (event.type === "exporting" && event.index === 2) {
				control.cancel();
			}
		};

		const result = await orchestrator(source).run(options(), cancelAtSecond, control);

		expect(result).toMatchObject({ attempted: 2, completed: 1, wasPaused: false, processedIds: ["p0"] });
		expect(messages()).toContain("Stopped: p1");
		expect(source.fetches).toEqual(["p0:original"]);
	});

	test("places next to a different file instead of overwriting it", async () => {
		const rel = outputPath("p0", capturedAt(0));
		await mkdir(join(dest, dateFolder(capturedAt(0))), { recursive: true });
		await writeFile(join(dest, rel), "someone else's photo");

		const result = await orchestrator(createMemorySource(photos(1))).run(
			options({ backupMode: "full" }),
			listener,
			createRunControl(),
		);

		expect(result.completed).toBe(1);
		expect(await readFile(join(dest, rel), "utf-8")).toBe("someone else's photo");
		expect(await readFile(join(dest, outputPath("p0", capturedAt(0), "_2.jpg")), "utf-8")).toBe("content of p0");
	});

	test("identical content already in place counts as skipped", async () => {
		const rel = outputPath("p0", capturedAt(0));
		await mkdir(join(dest, dateFolder(capturedAt(0))), { recursive: true });
		await writeFile(join(dest, rel), "content of p0");

		const result = await orchestrator(createMemorySource(photos(1))).run(
			options({ backupMode: "full" }),
			listener,
			createRunControl(),
		);

		expect(result).toMatchObject({ completed: 0, skipped: 1 });
		expect(await readdir(join(dest, dateFolder(capturedAt(0))))).toEqual([`${baseFileName(capturedAt(0), "p0")}.jpg`]);
	});

	test("a dry run writes nothing", async () => {
		const source = createMemorySource(photos(2));

		const result = await orchestrator(source).run(options({ dryRun: true }), listener, createRunControl());

		expect(result.completed).toBe(2);
		expect(existsSync(dest)).toBe(false);
		expect(messages()).toContain(`Dry run: would export ${outputPath("p0", capturedAt(0))}`);
		expect(source.fetches).toEqual([]);
	});

	test("exports live photo halves and adjustments under their own names", async () => {
		const source = createMemorySource([
			{
				id: "live",
				createdAt: capturedAt(0),
				contents: { original: "still", pairedVideo: "motion", adjustments: "edits" },
			},
		]);

		await orchestrator(source).run(options({ includeAdjustmentData: true }), listener, createRunControl());

		const folder = join(dest, dateFolder(capturedAt(0)));
		const base = baseFileName(capturedAt(0), "live");
		expect((await readdir(folder)).sort()).toEqual([`${base}.jpg`, `${base}_adjustments.aae`, `${base}_live.mov`]);
		expect(source.fetches).toEqual(["live:pairedVideo", "live:original", "live:adjustments"]);
	});

	describe("with a remote store", () => {
		let server: ReferenceServer;

		beforeEach(async () => {
			server = await createServer({ port: 0, apiKey: "test-secret" });
		});

		afterEach(async () => {
			await server.close();
		});

		function uploadOptions(overrides: Partial<SyncOptions> = {}, syncAlbums = false): SyncOptions {
			return options({
				folderDestination: undefined,
				backupMode: "full",
				upload: {
					serverUrl: server.url,
					apiKey: "test-secret",
					pipeline: {
						deviceId: "desk",
						uploadConcurrency: 2,
						hashConcurrency: 2,
						checksumPrecheck: true,
						skipHash: false,
						bulkCheckBatchSize: 50,
						existBatchSize: 50,
						syncAlbums,
						updateChangedAssets: false,
						flushDelayMs: 10,
						existWaitMs: 50,
					},
				},
				...overrides,
			});
		}

		function assetByDeviceId(deviceAssetId: string) {
			return [...server.store.assets.values()].find(asset => asset.deviceAssetId === deviceAssetId);
		}

		test("uploads new items and skips content the server already has", async () => {
			server.store.seedAsset({ deviceId: "phone", deviceAssetId: "elsewhere", content: "content of p0" });

			const result = await orchestrator(createMemorySource(photos(2))).run(
				uploadOptions(),
				listener,
				createRunControl(),
			);

			expect(result).toMatchObject({ completed: 2, errorCount: 0 });
			const uploads = server.store.requests.filter(r => r.method === "POST" && r.path === "/api/assets");
			expect(uploads).toHaveLength(1);
			expect(assetByDeviceId("p1")).toBeDefined();
			expect(assetByDeviceId("p0")).toBeUndefined();
			expect(await readdir(join(dir, "tmp"))).toEqual([]);
		});

		test("links the still of a live photo to its uploaded video", async () => {
			const source = createMemorySource([
				{ id: "live", createdAt: capturedAt(0), contents: { original: "still", pairedVideo: "motion" } },
			]);

			await orchestrator(source).run(uploadOptions(), listener, createRunControl());

			const video = assetByDeviceId("live:pairedVideo");
			expect(video).toBeDefined();
			expect(assetByDeviceId("live")?.livePhotoVideoId).toBe(video?.id);
		});

		test("adds uploaded items to albums named after the library albums", async () => {
			const trips = { id: "album-trips", title: "Trips" };
			const source = createMemorySource(photos(2, { albums: [trips] }));

			await orchestrator(source).run(uploadOptions({}, true), listener, createRunControl());

			const albums = [...server.store.albums.values()];
			expect(albums.map(album => album.albumName)).toEqual(["Trips"]);
			expect(albums[0]?.assetIds.size).toBe(2);
			expect(messages()).toContain('Remote: created album "Trips"');
		});
	});
});

describe("planVariants", () => {
	const item = createMemorySource([
		{ id: "live", createdAt: capturedAt(0), contents: { original: "a", pairedVideo: "b", adjustments: "c" } },
	]).items[0];

	test("orders the paired video first and appends the rendered edit", () => {
		const steps = planVariants(item, "both", true);
		expect(steps.map(step => [step.type, step.fileSuffix, step.extension])).toEqual([
			["pairedVideo", "_live", ".mov"],
			["original", "", ".jpg"],
			["adjustments", "_adjustments", ".aae"],
			["edited", "_edited", ".jpg"],
		]);
		expect(steps.map(step => step.awaitResult)).toEqual([true, false, false, false]);
	});

	test("leaves adjustment data out unless asked", () => {
		expect(planVariants(item, "originals", false).map(step => step.type)).toEqual(["pairedVideo", "original"]);
	});
});

describe("buildExistBatches", () => {
	test("never splits the ids of one item across batches", () => {
		const { items } = createMemorySource([
			{ id: "p0", createdAt: capturedAt(0) },
			{ id: "p1", createdAt: capturedAt(1), contents: { original: "a", pairedVideo: "b" } },
			{ id: "v2", createdAt: capturedAt(2), kind: "video" },
		]);

		expect(buildExistBatches(items, "originals", 3)).toEqual([
			{ ids: ["p0"], units: 1 },
			{ ids: ["p1", "p1:pairedVideo", "p1:video"], units: 1 },
			{ ids: ["v2:video"], units: 1 },
		]);
	});
});

describe("selectCandidates", () => {
	const { items } = createMemorySource([
		{ id: "late", createdAt: capturedAt(30), albums: [{ id: "a", title: "A" }] },
		{ id: "undated" },
		{ id: "early", createdAt: capturedAt(10), albums: [{ id: "a", title: "A" }] },
	]);
	const base = {
		mode: "originals",
		media: "all",
		sortOrder: "oldest",
		albumScope: "all",
		backupMode: "full",
		includeAdjustmentData: false,
		dryRun: false,
		retry: { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 1, jitter: false },
		requestTimeoutMs: 1000,
		downloadTimeoutMultiplier: 1,
		tempDir: "tmp",
		stateDir: "state",
	} satisfies SyncOptions;

	test("sorts oldest first with undated items at the front", () => {
		expect(selectCandidates(items, base).map(item => item.id)).toEqual(["undated", "early", "late"]);
	});

	test("applies the album scope and the limit after sorting newest first", () => {
		const selected = selectCandidates(items, { ...base, sortOrder: "newest", albumScope: { albumIds: ["a"] }, limit: 1 });
		expect(selected.map(item => item.id)).toEqual(["late"]);
	});
});
