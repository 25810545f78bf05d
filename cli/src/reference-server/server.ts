// Reference remote store - in-memory, Immich-compatible subset used by tests and local trials

import {
	BulkUploadCheckRequestSchema,
	CheckExistingRequestSchema,
	CreateAlbumRequestSchema,
	IdsRequestSchema,
	type RemoteAsset,
	UpdateAssetRequestSchema,
	UploadMetadataSchema,
} from "../remote/types";
import { API_KEY_HEADER, CHECKSUM_HEADER } from "../remote/RemoteClient";
import { errorMessage, getLog } from "../shared/logger";
import { createHash, randomUUID } from "node:crypto";
import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from "node:http";

const logger = getLog(import.meta);

export const DEFAULT_PORT = 2283;

// --- Internal Types ---
export type StoredAsset = RemoteAsset & {
	checksum: string;
	size: number;
	metadata: unknown;
};

type StoredAlbum = {
	id: string;
	albumName: string;
	assetIds: Set<string>;
};

type Fault = {
	method: string;
	pathPrefix: string;
	status: number;
	remaining: number;
};

export type ReferenceStore = {
	assets: Map<string, StoredAsset>;
	albums: Map<string, StoredAlbum>;
	requests: Array<{ method: string; path: string }>;
	/** Makes the next `count` requests matching method and path prefix fail with `status`. */
	failNext: (method: string, pathPrefix: string, status: number, count?: number) => void;
	/** Seeds an asset as if it had been uploaded earlier. */
	seedAsset: (asset: { deviceId: string; deviceAssetId: string; content: string | Buffer; filename?: string }) => StoredAsset;
	/** Disables PUT on album membership so clients have to fall back to POST. */
	rejectAlbumPut: boolean;
	/** Artificial latency added to every request. */
	latencyMs: number;
};

type CreateServerOptions = {
	port?: number;
	apiKey?: string;
};

export type ReferenceServer = {
	url: string;
	store: ReferenceStore;
	close: () => Promise<void>;
};

function sha1Hex(data: Buffer): string {
	return createHash("sha1").update(data).digest("hex");
}

function json(data: unknown, status = 200): Response {
	return Response.json(data, { status });
}

function badRequest(message: string): Response {
	return json({ message, statusCode: 400 }, 400);
}

/**
 * Builds the in-memory store and its request handler.
 */
export function createReferenceHandler(options: { apiKey?: string } = {}): {
	store: ReferenceStore;
	handle: (req: Request) => Promise<Response>;
} {
	const faults: Array<Fault> = [];
	const store: ReferenceStore = {
		assets: new Map(),
		albums: new Map(),
		requests: [],
		failNext(method, pathPrefix, status, count = 1) {
			faults.push({ method, pathPrefix, status, remaining: count });
		},
		seedAsset({ deviceId, deviceAssetId, content, filename }) {
			const bytes = typeof content === "string" ? Buffer.from(content) : content;
			const asset: StoredAsset = {
				id: randomUUID(),
				deviceId,
				deviceAssetId,
				originalFileName: filename ?? deviceAssetId,
				checksum: sha1Hex(bytes),
				size: bytes.length,
				metadata: [],
			};
			store.assets.set(asset.id, asset);
			return asset;
		},
		rejectAlbumPut: false,
		latencyMs: 0,
	};

	function takeFault(method: string, path: string): Fault | undefined {
		const fault = faults.find(f => f.method === method && path.startsWith(f.pathPrefix) && f.remaining > 0);
		if (fault) {
			fault.remaining--;
		}
		return fault;
	}

	function findByDevice(deviceId: string, deviceAssetId: string): StoredAsset | undefined {
		for (const asset of store.assets.values()) {
			if (asset.deviceId === deviceId && asset.deviceAssetId === deviceAssetId) {
				return asset;
			}
		}
		return;
	}

	function findByChecksum(checksum: string): StoredAsset | undefined {
		for (const asset of store.assets.values()) {
			if (asset.checksum === checksum) {
				return asset;
			}
		}
		return;
	}

	function publicAsset(asset: StoredAsset): RemoteAsset {
		const { metadata: _metadata, size: _size, ...rest } = asset;
		return rest;
	}

	// --- Handlers ---
	async function handleUpload(req: Request): Promise<Response> {
		const form = await req.formData();
		const file = form.get("assetData");
		const deviceId = form.get("deviceId");
		const deviceAssetId = form.get("deviceAssetId");
		const fileCreatedAt = form.get("fileCreatedAt");
		const fileModifiedAt = form.get("fileModifiedAt");
		if (file === null || typeof file === "string") {
			return badRequest("assetData must be a file");
		}
		if (typeof deviceId !== "string" || typeof deviceAssetId !== "string") {
			return badRequest("deviceId and deviceAssetId are required");
		}
		if (typeof fileCreatedAt !== "string" || typeof fileModifiedAt !== "string") {
			return badRequest("fileCreatedAt and fileModifiedAt are required");
		}

		const bytes = Buffer.from(await file.arrayBuffer());
		const checksum = sha1Hex(bytes);
		const declared = req.headers.get(CHECKSUM_HEADER);
		if (declared && declared !== checksum) {
			return badRequest("checksum mismatch");
		}

		const duplicate = findByChecksum(checksum);
		if (duplicate) {
			return json({ id: duplicate.id, status: "duplicate" });
		}

		const filename = form.get("filename");
		const duration = form.get("duration");
		const isFavorite = form.get("isFavorite");
		const livePhotoVideoId = form.get("livePhotoVideoId");
		const metadataField = form.get("metadata");
		const metadata =
			typeof metadataField === "string" ? UploadMetadataSchema.safeParse(JSON.parse(metadataField)) : undefined;
		if (metadata && !metadata.success) {
			return badRequest("metadata must be an array of objects");
		}

		const asset: StoredAsset = {
			id: randomUUID(),
			deviceId,
			deviceAssetId,
			originalFileName: typeof filename === "string" ? filename : file.name,
			fileCreatedAt,
			fileModifiedAt,
			isFavorite: isFavorite === "true",
			duration: typeof duration === "string" ? duration : undefined,
			livePhotoVideoId: typeof livePhotoVideoId === "string" ? livePhotoVideoId : null,
			checksum,
			size: bytes.length,
			metadata: metadata?.data ?? [],
		};
		store.assets.set(asset.id, asset);
		return json({ id: asset.id, status: "created" }, 201);
	}

	async function route(req: Request, method: string, path: string): Promise<Response> {
		if (method === "GET" && path === "/api/server/ping") {
			return json({ res: "pong" });
		}

		if (method === "GET" && path === "/api/users/me") {
			return json({ id: "user-1", email: "owner@example.test", name: "Owner" });
		}

		if (method === "GET" && path === "/api/assets/statistics") {
			let videos = 0;
			for (const asset of store.assets.values()) {
				if (asset.duration) {
					videos++;
				}
			}
			return json({ images: store.assets.size - videos, videos, total: store.assets.size });
		}

		if (method === "POST" && path === "/api/assets/exist") {
			const parsed = CheckExistingRequestSchema.safeParse(await req.json());
			if (!parsed.success) {
				return badRequest("invalid exist request");
			}
			const { deviceId, deviceAssetIds } = parsed.data;
			const existingIds = deviceAssetIds.filter(id => findByDevice(deviceId, id) !== undefined);
			return json({ existingIds });
		}

		if (method === "POST" && path === "/api/assets/bulk-upload-check") {
			const parsed = BulkUploadCheckRequestSchema.safeParse(await req.json());
			if (!parsed.success) {
				return badRequest("invalid bulk check request");
			}
			const results = parsed.data.assets.map(item => {
				const existing = findByChecksum(item.checksum);
				return existing
					? { id: item.id, action: "reject", reason: "duplicate", assetId: existing.id, isTrashed: false }
					: { id: item.id, action: "accept" };
			});
			return json({ results });
		}

		if (method === "POST" && path === "/api/assets") {
			return handleUpload(req);
		}

		if (method === "DELETE" && path === "/api/assets") {
			const parsed = IdsRequestSchema.safeParse(await req.json());
			if (!parsed.success) {
				return badRequest("invalid delete request");
			}
			for (const id of parsed.data.ids) {
				store.assets.delete(id);
				for (const album of store.albums.values()) {
					album.assetIds.delete(id);
				}
			}
			return new Response(null, { status: 204 });
		}

		const byDevice = path.match(/^\/api\/assets\/assetByDeviceId\/([^/]+)\/([^/]+)$/);
		if (method === "GET" && byDevice) {
			const asset = findByDevice(decodeURIComponent(byDevice[1]), decodeURIComponent(byDevice[2]));
			return asset ? json({ id: asset.id }) : json({ message: "Not found" }, 404);
		}

		const assetPath = path.match(/^\/api\/assets\/([^/]+)$/);
		if (assetPath) {
			const asset = store.assets.get(decodeURIComponent(assetPath[1]));
			if (!asset) {
				return json({ message: "Asset not found" }, 404);
			}
			if (method === "GET") {
				return json(publicAsset(asset));
			}
			if (method === "PUT") {
				const parsed = UpdateAssetRequestSchema.safeParse(await req.json());
				if (!parsed.success) {
					return badRequest("invalid asset update");
				}
				const { isFavorite, isArchived, description } = parsed.data;
				const updated: StoredAsset = {
					...asset,
					...(isFavorite !== undefined ? { isFavorite } : {}),
					...(isArchived !== undefined ? { isArchived } : {}),
					...(description !== undefined ? { description } : {}),
				};
				store.assets.set(asset.id, updated);
				return json(publicAsset(updated));
			}
		}

		if (path === "/api/albums") {
			if (method === "GET") {
				return json(
					[...store.albums.values()].map(a => ({
						id: a.id,
						albumName: a.albumName,
						assetCount: a.assetIds.size,
					})),
				);
			}
			if (method === "POST") {
				const parsed = CreateAlbumRequestSchema.safeParse(await req.json());
				if (!parsed.success) {
					return badRequest("albumName is required");
				}
				const album: StoredAlbum = { id: randomUUID(), albumName: parsed.data.albumName, assetIds: new Set() };
				store.albums.set(album.id, album);
				return json({ id: album.id, albumName: album.albumName, assetCount: 0 }, 201);
			}
		}

		const albumAssets = path.match(/^\/api\/albums\/([^/]+)\/assets$/);
		if (albumAssets && (method === "PUT" || method === "POST")) {
			if (method === "PUT" && store.rejectAlbumPut) {
				return json({ message: "Method not allowed" }, 405);
			}
			const album = store.albums.get(decodeURIComponent(albumAssets[1]));
			if (!album) {
				return json({ message: "Album not found" }, 404);
			}
			const parsed = IdsRequestSchema.safeParse(await req.json());
			if (!parsed.success) {
				return badRequest("ids are required");
			}
			const results = parsed.data.ids.map(id => {
				if (!store.assets.has(id)) {
					return { id, success: false, error: "not_found" };
				}
				if (album.assetIds.has(id)) {
					return { id, success: false, error: "duplicate" };
				}
				album.assetIds.add(id);
				return { id, success: true };
			});
			return json(results);
		}

		return json({ message: "Not Found" }, 404);
	}

	async function handle(req: Request): Promise<Response> {
		const url = new URL(req.url);
		const method = req.method;
		const path = url.pathname;
		store.requests.push({ method, path });

		if (store.latencyMs > 0) {
			await new Promise(resolve => setTimeout(resolve, store.latencyMs));
		}

		if (options.apiKey && req.headers.get(API_KEY_HEADER) !== options.apiKey) {
			return json({ message: "Invalid API key", statusCode: 401 }, 401);
		}

		const fault = takeFault(method, path);
		if (fault) {
			return json({ message: "Injected failure" }, fault.status);
		}

		try {
			return await route(req, method, path);
		} catch (err) {
			logger.warn("request %s %s failed: %s", method, path, errorMessage(err));
			return badRequest(errorMessage(err));
		}
	}

	return { store, handle };
}

const HOP_BY_HOP_HEADERS = new Set(["connection", "content-length", "host", "keep-alive", "transfer-encoding"]);

async function toWebRequest(incoming: IncomingMessage, origin: string): Promise<Request> {
	const chunks: Array<Buffer> = [];
	for await (const chunk of incoming) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	const headers = new Headers();
	for (const [key, value] of Object.entries(incoming.headers)) {
		if (HOP_BY_HOP_HEADERS.has(key)) {
			continue;
		}
		if (Array.isArray(value)) {
			for (const item of value) {
				headers.append(key, item);
			}
		} else if (value !== undefined) {
			headers.set(key, value);
		}
	}
	const method = incoming.method ?? "GET";
	const hasBody = method !== "GET" && method !== "HEAD" && chunks.length > 0;
	return new Request(new URL(incoming.url ?? "/", origin), {
		method,
		headers,
		body: hasBody ? Buffer.concat(chunks) : undefined,
	});
}

async function writeWebResponse(res: Response, outgoing: ServerResponse): Promise<void> {
	res.headers.forEach((value, key) => {
		outgoing.setHeader(key, value);
	});
	outgoing.statusCode = res.status;
	outgoing.end(Buffer.from(await res.arrayBuffer()));
}

/**
 * Starts the reference server on the given port (0 picks a free one).
 */
export function createServer(options: CreateServerOptions = {}): Promise<ReferenceServer> {
	const { store, handle } = createReferenceHandler({ apiKey: options.apiKey });

	const server = createHttpServer((incoming, outgoing) => {
		const origin = `http://${incoming.headers.host ?? "localhost"}`;
		toWebRequest(incoming, origin)
			.then(handle)
			.then(res => writeWebResponse(res, outgoing))
			.catch((err: unknown) => {
				logger.error("unhandled request failure: %s", errorMessage(err));
				outgoing.statusCode = 500;
				outgoing.end();
			});
	});

	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(options.port ?? DEFAULT_PORT, "127.0.0.1", () => {
			const address = server.address();
			const port = typeof address === "object" && address !== null ? address.port : (options.port ?? DEFAULT_PORT);
			resolve({
				url: `http://127.0.0.1:${port}`,
				store,
				close: () =>
					new Promise<void>((done, fail) => {
						server.closeAllConnections();
						server.close(err => (err ? fail(err) : done()));
					}),
			});
		});
	});
}
