import type { RemoteStoreClient, UploadAssetInput } from "./RemoteClient";
import type { BulkUploadCheckItem } from "./types";
import { vi } from "vitest";

export function mockRemoteClient(overrides: Partial<RemoteStoreClient> = {}): RemoteStoreClient {
	let uploads = 0;
	let albums = 0;
	return {
		apiBase: "http://photos.test/api",
		ping: vi.fn().mockResolvedValue(undefined),
		getMe: vi.fn().mockResolvedValue(undefined),
		getStatistics: vi.fn().mockResolvedValue({ images: 0, videos: 0, total: 0 }),
		checkExisting: vi.fn().mockResolvedValue(new Set<string>()),
		bulkUploadCheck: vi.fn((items: Array<BulkUploadCheckItem>) =>
			Promise.resolve(items.map(item => ({ id: item.id, action: "accept" }))),
		),
		uploadAsset: vi.fn((_input: UploadAssetInput) => {
			uploads++;
			return Promise.resolve({ id: `asset-${uploads}`, status: "created" });
		}),
		listAlbums: vi.fn().mockResolvedValue([]),
		createAlbum: vi.fn((name: string) => {
			albums++;
			return Promise.resolve({ id: `album-${albums}`, albumName: name });
		}),
		addAssetsToAlbum: vi.fn().mockResolvedValue(undefined),
		getAsset: vi.fn().mockRejectedValue(new Error("not found")),
		updateAsset: vi.fn().mockRejectedValue(new Error("not found")),
		getAssetIdByDeviceId: vi.fn().mockResolvedValue(undefined),
		deleteAssets: vi.fn().mockResolvedValue(undefined),
		...overrides,
	};
}
