import { AlbumSchema, AssetSchema, UploadResponseSchema } from "../remote/types";
import { createServer, type ReferenceServer } from "./server";
import { createHash } from "node:crypto";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

describe("reference server", () => {
	let server: ReferenceServer;

	beforeEach(async () => {
		server = await createServer({ port: 0, apiKey: "test-secret" });
	});

	afterEach(async () => {
		await server.close();
	});

	function call(method: string, path: string, body?: unknown, apiKey = "test-secret"): Promise<Response> {
		return fetch(`${server.url}/api/${path}`, {
			method,
			headers: { "x-api-key": apiKey, "content-type": "application/json" },
			body: body === undefined ? undefined : JSON.stringify(body),
		});
	}

	function upload(content: string, deviceAssetId: string, checksum?: string): Promise<Response> {
		const form = new FormData();
		form.append("deviceId", "desk");
		form.append("deviceAssetId", deviceAssetId);
		form.append("fileCreatedAt", "2024-03-05T07:08:09.000Z");
		form.append("fileModifiedAt", "2024-03-05T07:08:09.000Z");
		form.append("assetData", new Blob([content]), `${deviceAssetId}.jpg`);
		const headers: Record<string, string> = { "x-api-key": "test-secret" };
		if (checksum) {
			headers["x-immich-checksum"] = checksum;
		}
		return fetch(`${server.url}/api/assets`, { method: "POST", headers, body: form });
	}

	test("rejects requests without the api key", async () => {
		const res = await call("GET", "server/ping", undefined, "wrong");
		expect(res.status).toBe(401);
	});

	test("answers ping", async () => {
		const res = await call("GET", "server/ping");
		expect(await res.json()).toEqual({ res: "pong" });
	});

	test("upload creates once and reports duplicates by content", async () => {
		const first = await upload("pixels", "IMG-1");
		expect(first.status).toBe(201);
		const created = UploadResponseSchema.parse(await first.json());
		expect(created.status).toBe("created");

		const second = await upload("pixels", "IMG-2");
		expect(second.status).toBe(200);
		expect(await second.json()).toEqual({ id: created.id, status: "duplicate" });
		expect(server.store.assets.size).toBe(1);
	});

	test("upload rejects a checksum header that does not match the bytes", async () => {
		const res = await upload("pixels", "IMG-1", "0000");
		expect(res.status).toBe(400);
	});

	test("upload accepts the matching checksum header", async () => {
		const sha1 = createHash("sha1").update("pixels").digest("hex");
		const res = await upload("pixels", "IMG-1", sha1);
		expect(res.status).toBe(201);
		const [asset] = [...server.store.assets.values()];
		expect(asset?.checksum).toBe(sha1);
		expect(asset?.deviceAssetId).toBe("IMG-1");
	});

	test("exist reports only device asset ids that were uploaded", async () => {
		server.store.seedAsset({ deviceId: "desk", deviceAssetId: "A", content: "a" });
		server.store.seedAsset({ deviceId: "other", deviceAssetId: "B", content: "b" });
		const res = await call("POST", "assets/exist", { deviceId: "desk", deviceAssetIds: ["A", "B", "C"] });
		expect(await res.json()).toEqual({ existingIds: ["A"] });
	});

	test("bulk upload check rejects known checksums", async () => {
		const seeded = server.store.seedAsset({ deviceId: "desk", deviceAssetId: "A", content: "a" });
		const res = await call("POST", "assets/bulk-upload-check", {
			assets: [
				{ id: "A", checksum: seeded.checksum },
				{ id: "Z", checksum: "ffff" },
			],
		});
		expect(await res.json()).toEqual({
			results: [
				{ id: "A", action: "reject", reason: "duplicate", assetId: seeded.id, isTrashed: false },
				{ id: "Z", action: "accept" },
			],
		});
	});

	test("albums collect assets and report duplicates", async () => {
		const asset = server.store.seedAsset({ deviceId: "desk", deviceAssetId: "A", content: "a" });
		const created = AlbumSchema.parse(await (await call("POST", "albums", { albumName: "Trips" })).json());
		const first = await (await call("PUT", `albums/${created.id}/assets`, { ids: [asset.id, "missing"] })).json();
		expect(first).toEqual([
			{ id: asset.id, success: true },
			{ id: "missing", success: false, error: "not_found" },
		]);
		const second = await (await call("PUT", `albums/${created.id}/assets`, { ids: [asset.id] })).json();
		expect(second).toEqual([{ id: asset.id, success: false, error: "duplicate" }]);

		const albums = await (await call("GET", "albums")).json();
		expect(albums).toEqual([{ id: created.id, albumName: "Trips", assetCount: 1 }]);
	});

	test("album PUT can be disabled", async () => {
		server.store.rejectAlbumPut = true;
		const created = AlbumSchema.parse(await (await call("POST", "albums", { albumName: "Trips" })).json());
		const res = await call("PUT", `albums/${created.id}/assets`, { ids: [] });
		expect(res.status).toBe(405);
	});

	test("device lookup only answers on the legacy route", async () => {
		const asset = server.store.seedAsset({ deviceId: "desk", deviceAssetId: "A", content: "a" });
		expect((await call("GET", "assets/device/desk/A")).status).toBe(404);
		const res = await call("GET", "assets/assetByDeviceId/desk/A");
		expect(await res.json()).toEqual({ id: asset.id });
	});

	test("update patches favorite and description", async () => {
		const asset = server.store.seedAsset({ deviceId: "desk", deviceAssetId: "A", content: "a" });
		const res = await call("PUT", `assets/${asset.id}`, { isFavorite: true, description: "beach" });
		const raw = await res.json();
		expect(raw).not.toHaveProperty("metadata");
		const body = AssetSchema.parse(raw);
		expect(body.isFavorite).toBe(true);
		expect(body.description).toBe("beach");
	});

	test("delete removes assets and album membership", async () => {
		const asset = server.store.seedAsset({ deviceId: "desk", deviceAssetId: "A", content: "a" });
		const created = AlbumSchema.parse(await (await call("POST", "albums", { albumName: "Trips" })).json());
		await call("PUT", `albums/${created.id}/assets`, { ids: [asset.id] });

		const res = await call("DELETE", "assets", { ids: [asset.id] });
		expect(res.status).toBe(204);
		expect(server.store.assets.size).toBe(0);
		expect(server.store.albums.get(created.id)?.assetIds.size).toBe(0);
	});

	test("statistics count images and videos", async () => {
		server.store.seedAsset({ deviceId: "desk", deviceAssetId: "A", content: "a" });
		server.store.seedAsset({ deviceId: "desk", deviceAssetId: "B", content: "b" });
		const res = await call("GET", "assets/statistics");
		expect(await res.json()).toEqual({ images: 2, videos: 0, total: 2 });
	});

	test("injected faults fail the next matching requests", async () => {
		server.store.failNext("GET", "/api/server/ping", 503, 2);
		expect((await call("GET", "server/ping")).status).toBe(503);
		expect((await call("GET", "server/ping")).status).toBe(503);
		expect((await call("GET", "server/ping")).status).toBe(200);
	});
});
