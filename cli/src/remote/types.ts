// Wire types of the Immich-compatible remote store, shared by the client and the reference server
import { z } from "zod";

// =============================================================================
// Schemas
// =============================================================================

export const ServerPingResponseSchema = z.object({
	res: z.string().optional(),
	message: z.string().optional(),
});

export const UserResponseSchema = z.object({
	id: z.string().optional(),
	email: z.string().optional(),
	name: z.string().optional(),
});

export const AssetStatisticsSchema = z.object({
	images: z.number().int(),
	videos: z.number().int(),
	total: z.number().int(),
});

export const CheckExistingRequestSchema = z.object({
	deviceId: z.string(),
	deviceAssetIds: z.array(z.string()),
});

export const CheckExistingResponseSchema = z.object({
	existingIds: z.array(z.string()),
});

export const BulkUploadCheckItemSchema = z.object({
	id: z.string(),
	checksum: z.string(),
});

export const BulkUploadCheckRequestSchema = z.object({
	assets: z.array(BulkUploadCheckItemSchema),
});

export const BulkUploadCheckResultSchema = z.object({
	id: z.string(),
	action: z.string(),
	reason: z.string().optional(),
	assetId: z.string().optional(),
	isTrashed: z.boolean().optional(),
});

export const BulkUploadCheckResponseSchema = z.object({
	results: z.array(BulkUploadCheckResultSchema),
});

export const UploadResponseSchema = z.object({
	id: z.string(),
	status: z.string(),
});

export const AlbumSchema = z.object({
	id: z.string(),
	albumName: z.string().optional(),
	assetCount: z.number().int().optional(),
});

export const AlbumListSchema = z.array(AlbumSchema);

export const CreateAlbumRequestSchema = z.object({
	albumName: z.string().min(1),
});

export const IdsRequestSchema = z.object({
	ids: z.array(z.string()),
});

export const AlbumAssetResultSchema = z.object({
	id: z.string(),
	success: z.boolean(),
	error: z.string().optional(),
});

export const AssetSchema = z.object({
	id: z.string(),
	deviceAssetId: z.string(),
	deviceId: z.string(),
	originalFileName: z.string().optional(),
	fileCreatedAt: z.string().optional(),
	fileModifiedAt: z.string().optional(),
	isFavorite: z.boolean().optional(),
	isArchived: z.boolean().optional(),
	description: z.string().optional(),
	duration: z.string().optional(),
	livePhotoVideoId: z.string().nullable().optional(),
	checksum: z.string().optional(),
});

export const AssetIdSchema = z.object({
	id: z.string(),
});

export const UpdateAssetRequestSchema = z.object({
	isFavorite: z.boolean().optional(),
	isArchived: z.boolean().optional(),
	description: z.string().optional(),
	dateTimeOriginal: z.string().optional(),
	latitude: z.number().optional(),
	longitude: z.number().optional(),
	rating: z.number().int().min(0).max(5).optional(),
});

export const UploadMetadataSchema = z.array(z.record(z.unknown()));

// =============================================================================
// Inferred Types
// =============================================================================

export type AssetStatistics = z.infer<typeof AssetStatisticsSchema>;
export type CheckExistingRequest = z.infer<typeof CheckExistingRequestSchema>;
export type BulkUploadCheckItem = z.infer<typeof BulkUploadCheckItemSchema>;
export type BulkUploadCheckResult = z.infer<typeof BulkUploadCheckResultSchema>;
export type UploadResponse = z.infer<typeof UploadResponseSchema>;
export type Album = z.infer<typeof AlbumSchema>;
export type AlbumAssetResult = z.infer<typeof AlbumAssetResultSchema>;
export type RemoteAsset = z.infer<typeof AssetSchema>;
export type UpdateAssetRequest = z.infer<typeof UpdateAssetRequestSchema>;
export type UploadMetadata = z.infer<typeof UploadMetadataSchema>;
