import { mockRemoteClient } from "../remote/RemoteClient.mock";
import { chunk, createAlbumCollector, remoteAlbumNames, syncAlbums } from "./AlbumSync";
import { describe, expect, test, vi } from "vitest";

describe("AlbumSync", () => {
	test("collector groups asset ids by album", () => {
		const collector = createAlbumCollector();
		const trips = { id: "Trips", title: "Trips" };
		const pets = { id: "Pets", title: "Pets" };
		collector.add("r1", [trips]);
		collector.add("r2", [trips, pets]);
		collector.add("r1", [trips]);

		expect(collector.snapshot()).toEqual([
			{ album: trips, assetIds: ["r1", "r2"] },
			{ album: pets, assetIds: ["r2"] },
		]);
	});

	test("duplicate titles are disambiguated with the short id", () => {
		const names = remoteAlbumNames([
			{ album: { id: "a/Summer-2023", title: "Summer" }, assetIds: ["1"] },
			{ album: { id: "b/Summer-2024", title: "Summer" }, assetIds: ["2"] },
			{ album: { id: "Pets", title: "Pets" }, assetIds: ["3"] },
		]);
		expect([...names.values()]).toEqual(["Summer (Photos Summer2023)", "Summer (Photos Summer2024)", "Pets"]);
	});

	test("chunk splits into fixed-size slices", () => {
		expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
		expect(chunk([], 500)).toEqual([]);
	});

	test("reuses existing albums, creates missing ones and adds in chunks", async () => {
		const client = mockRemoteClient({
			listAlbums: vi.fn().mockResolvedValue([{ id: "remote-trips", albumName: "Trips" }]),
		});
		const messages: Array<string> = [];
		const many = Array.from({ length: 1001 }, (_, i) => `r${i}`);

		const result = await syncAlbums({
			client,
			entries: [
				{ album: { id: "Trips", title: "Trips" }, assetIds: ["r1"] },
				{ album: { id: "Pets", title: "Pets" }, assetIds: many },
			],
			shouldCancel: () => false,
			onMessage: text => messages.push(text),
		});

		expect(result).toEqual({ created: 1, added: 1002 });
		expect(client.createAlbum).toHaveBeenCalledWith("Pets");
		expect(vi.mocked(client.addAssetsToAlbum).mock.calls.map(([id, ids]) => [id, ids.length])).toEqual([
			["remote-trips", 1],
			["album-1", 500],
			["album-1", 500],
			["album-1", 1],
		]);
		expect(messages).toEqual([
			"Remote: syncing albums...",
			'Remote: created album "Pets"',
			"Remote: album sync complete",
		]);
	});

	test("a failed creation skips that album only", async () => {
		const client = mockRemoteClient({
			createAlbum: vi.fn().mockRejectedValueOnce(new Error("HTTP 500")).mockResolvedValue({ id: "ok" }),
		});
		const messages: Array<string> = [];

		await syncAlbums({
			client,
			entries: [
				{ album: { id: "A", title: "A" }, assetIds: ["1"] },
				{ album: { id: "B", title: "B" }, assetIds: ["2"] },
			],
			shouldCancel: () => false,
			onMessage: text => messages.push(text),
		});

		expect(messages).toContain('ERROR Remote: could not create album "A": HTTP 500');
		expect(client.addAssetsToAlbum).toHaveBeenCalledTimes(1);
		expect(client.addAssetsToAlbum).toHaveBeenCalledWith("ok", ["2"]);
	});
});
