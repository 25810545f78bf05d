import { getLog } from "../shared/logger";
import {
	type Album,
	AlbumListSchema,
	AlbumSchema,
	type AssetStatistics,
	AssetIdSchema,
	AssetSchema,
	AssetStatisticsSchema,
	type BulkUploadCheckItem,
	type BulkUploadCheckResult,
	BulkUploadCheckResponseSchema,
	CheckExistingResponseSchema,
	type RemoteAsset,
	ServerPingResponseSchema,
	type UpdateAssetRequest,
	type UploadMetadata,
	type UploadResponse,
	UploadResponseSchema,
	UserResponseSchema,
} from "./types";
import { openAsBlob } from "node:fs";
import { basename } from "node:path";
import mime from "mime-types";
import type { z } from "zod";

const log = getLog(import.meta);

/** Request header carrying the SHA-1 of the uploaded bytes. */
export const CHECKSUM_HEADER = "x-immich-checksum";
export const API_KEY_HEADER = "x-api-key";

const ERROR_BODY_LIMIT = 2000;

/**
 * Non-2xx answer from the remote store.
 */
export class RemoteStoreError extends Error {
	readonly status: number;
	readonly body: string;

	constructor(method: string, path: string, status: number, body: string) {
		super(`HTTP ${status} for ${method} ${path}: ${body}`);
		this.name = "RemoteStoreError";
		this.status = status;
		this.body = body;
	}
}

export type RemoteClientOptions = {
	serverUrl: string;
	apiKey: string;
	/** Per-request timeout; unset means no client-side limit. */
	requestTimeoutMs?: number;
	fetch?: typeof fetch;
};

export type UploadAssetInput = {
	filePath: string;
	/** SHA-1 hex of the file, sent as the checksum header when known. */
	checksum?: string;
	deviceId: string;
	deviceAssetId: string;
	filename: string;
	fileCreatedAt: Date;
	fileModifiedAt: Date;
	durationSeconds?: number;
	isFavorite?: boolean;
	livePhotoVideoId?: string;
	metadata: UploadMetadata;
};

/**
 * Stateless request/response wrapper around the remote store API. No retries and no batching:
 * callers own both.
 */
export interface RemoteStoreClient {
	readonly apiBase: string;
	ping(): Promise<void>;
	getMe(): Promise<void>;
	getStatistics(): Promise<AssetStatistics>;
	checkExisting(deviceId: string, deviceAssetIds: Array<string>): Promise<Set<string>>;
	bulkUploadCheck(items: Array<BulkUploadCheckItem>): Promise<Array<BulkUploadCheckResult>>;
	uploadAsset(input: UploadAssetInput): Promise<UploadResponse>;
	listAlbums(): Promise<Array<Album>>;
	createAlbum(name: string): Promise<Album>;
	/** Adds assets with PUT, falling back to POST for servers that only accept the older verb. */
	addAssetsToAlbum(albumId: string, assetIds: Array<string>): Promise<void>;
	getAsset(assetId: string): Promise<RemoteAsset>;
	updateAsset(assetId: string, patch: UpdateAssetRequest): Promise<RemoteAsset>;
	/** Resolves the server id of a device asset, or undefined when no lookup route knows it. */
	getAssetIdByDeviceId(deviceId: string, deviceAssetId: string): Promise<string | undefined>;
	deleteAssets(assetIds: Array<string>): Promise<void>;
}

/**
 * Appends "/api" to the server URL unless its last path segment already is "api".
 */
export function resolveApiBase(serverUrl: string): string {
	const url = new URL(serverUrl);
	const segments = url.pathname.split("/").filter(Boolean);
	if (segments[segments.length - 1] !== "api") {
		segments.push("api");
	}
	url.pathname = `/${segments.join("/")}`;
	url.search = "";
	url.hash = "";
	return url.toString().replace(/\/+$/, "");
}

export function createRemoteClient(options: RemoteClientOptions): RemoteStoreClient {
	const apiBase = resolveApiBase(options.serverUrl);
	const doFetch = options.fetch ?? fetch;

	return {
		apiBase,
		ping,
		getMe,
		getStatistics,
		checkExisting,
		bulkUploadCheck,
		uploadAsset,
		listAlbums,
		createAlbum,
		addAssetsToAlbum,
		getAsset,
		updateAsset,
		getAssetIdByDeviceId,
		deleteAssets,
	};

	function timeoutSignal(): AbortSignal | undefined {
		return options.requestTimeoutMs ? AbortSignal.timeout(options.requestTimeoutMs) : undefined;
	}

	async function requestRaw(
		method: string,
		path: string,
		body?: unknown,
		extraHeaders?: Record<string, string>,
	): Promise<string> {
		const headers: Record<string, string> = { [API_KEY_HEADER]: options.apiKey, ...extraHeaders };
		const init: RequestInit = { method, headers, signal: timeoutSignal() };
		if (body instanceof FormData) {
			init.body = body;
		} else if (body !== undefined) {
			headers["content-type"] = "application/json";
			init.body = JSON.stringify(body);
		}

		log.debug("%s %s", method, path);
		const res = await doFetch(`${apiBase}/${path}`, init);
		const text = await res.text();
		if (!res.ok) {
			throw new RemoteStoreError(method, path, res.status, text.slice(0, ERROR_BODY_LIMIT));
		}
		return text;
	}

	async function requestJson<T extends z.ZodTypeAny>(
		schema: T,
		method: string,
		path: string,
		body?: unknown,
		extraHeaders?: Record<string, string>,
	): Promise<z.infer<T>> {
		const text = await requestRaw(method, path, body, extraHeaders);
		return schema.parse(text ? JSON.parse(text) : undefined);
	}

	async function ping(): Promise<void> {
		await requestJson(ServerPingResponseSchema, "GET", "server/ping");
	}

	async function getMe(): Promise<void> {
		await requestJson(UserResponseSchema, "GET", "users/me");
	}

	function getStatistics(): Promise<AssetStatistics> {
		return requestJson(AssetStatisticsSchema, "GET", "assets/statistics");
	}

	async function checkExisting(deviceId: string, deviceAssetIds: Array<string>): Promise<Set<string>> {
		const resp = await requestJson(CheckExistingResponseSchema, "POST", "assets/exist", {
			deviceId,
			deviceAssetIds,
		});
		return new Set(resp.existingIds);
	}

	async function bulkUploadCheck(items: Array<BulkUploadCheckItem>): Promise<Array<BulkUploadCheckResult>> {
		const resp = await requestJson(BulkUploadCheckResponseSchema, "POST", "assets/bulk-upload-check", {
			assets: items,
		});
		return resp.results;
	}

	async function uploadAsset(input: UploadAssetInput): Promise<UploadResponse> {
		const form = new FormData();
		form.append("deviceId", input.deviceId);
		form.append("deviceAssetId", input.deviceAssetId);
		form.append("fileCreatedAt", input.fileCreatedAt.toISOString());
		form.append("fileModifiedAt", input.fileModifiedAt.toISOString());
		form.append("filename", input.filename);
		if (input.durationSeconds !== undefined) {
			form.append("duration", String(input.durationSeconds));
		}
		if (input.isFavorite !== undefined) {
			form.append("isFavorite", input.isFavorite ? "true" : "false");
		}
		if (input.livePhotoVideoId) {
			form.append("livePhotoVideoId", input.livePhotoVideoId);
		}
		form.append("metadata", JSON.stringify(input.metadata));

		const contentType = mime.lookup(input.filePath) || "application/octet-stream";
		const blob = await openAsBlob(input.filePath, { type: contentType });
		form.append("assetData", blob, basename(input.filePath));

		const headers: Record<string, string> = {};
		if (input.checksum) {
			headers[CHECKSUM_HEADER] = input.checksum;
		}
		return requestJson(UploadResponseSchema, "POST", "assets", form, headers);
	}

	function listAlbums(): Promise<Array<Album>> {
		return requestJson(AlbumListSchema, "GET", "albums");
	}

	function createAlbum(name: string): Promise<Album> {
		return requestJson(AlbumSchema, "POST", "albums", { albumName: name });
	}

	async function addAssetsToAlbum(albumId: string, assetIds: Array<string>): Promise<void> {
		const path = `albums/${encodeURIComponent(albumId)}/assets`;
		try {
			await requestRaw("PUT", path, { ids: assetIds });
		} catch (putError) {
			log.debug({ err: putError }, "PUT %s failed, retrying with POST", path);
			await requestRaw("POST", path, { ids: assetIds });
		}
	}

	function getAsset(assetId: string): Promise<RemoteAsset> {
		return requestJson(AssetSchema, "GET", `assets/${encodeURIComponent(assetId)}`);
	}

	function updateAsset(assetId: string, patch: UpdateAssetRequest): Promise<RemoteAsset> {
		return requestJson(AssetSchema, "PUT", `assets/${encodeURIComponent(assetId)}`, patch);
	}

	async function getAssetIdByDeviceId(deviceId: string, deviceAssetId: string): Promise<string | undefined> {
		const device = encodeURIComponent(deviceId);
		const asset = encodeURIComponent(deviceAssetId);
		const candidatePaths = [`assets/device/${device}/${asset}`, `assets/assetByDeviceId/${device}/${asset}`];
		for (const path of candidatePaths) {
			let text: string;
			try {
				text = await requestRaw("GET", path);
			} catch (err) {
				log.debug({ err }, "lookup via %s failed", path);
				continue;
			}
			const parsed = AssetIdSchema.safeParse(parseJson(text));
			if (parsed.success) {
				return parsed.data.id;
			}
		}
		return;
	}

	async function deleteAssets(assetIds: Array<string>): Promise<void> {
		await requestRaw("DELETE", "assets", { ids: assetIds });
	}
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return;
	}
}
