// Sync module - library export to folders and the remote store
// This module provides the orchestrator, folder backup, run control and the supporting stores

// Types
export type {
	AlbumRef,
	AlbumScope,
	AssetSource,
	BackupMode,
	CandidateItem,
	ExportMode,
	ExportVariantType,
	ListItemsFilter,
	MediaFilter,
	MediaKind,
	ProgressEvent,
	ProgressEventOf,
	ProgressListener,
	ProgressReporter,
	RunResult,
	SortOrder,
	SyncOptions,
	UploadTarget,
	Variant,
	VariantType,
} from "./Types";
// Orchestrator
export type { SyncOrchestrator, SyncOrchestratorDeps, VariantStep } from "./SyncOrchestrator";
export {
	buildExistBatches,
	createSyncOrchestrator,
	manifestKey,
	METADATA_SOURCE,
	planVariants,
	selectCandidates,
	SyncSetupError,
	sweepIds,
	variantSignature,
} from "./SyncOrchestrator";
// Folder backup
export type {
	FolderBackupDeps,
	FolderBackupOptions,
	FolderBackupResult,
	FolderUploadTarget,
	ScannedFile,
} from "./FolderBackup";
export { FOLDER_TEMP_DIR, fileKey, fileSignature, runFolderBackup, scanFolders } from "./FolderBackup";
// Run control and sessions
export type { RunControl, RunState } from "./RunControl";
export { createRunControl } from "./RunControl";
export type { ConfigSnapshot, ResumeOrder, RunSession, SessionStore } from "./Session";
export {
	buildSession,
	configSnapshotOf,
	createSessionStore,
	isResumable,
	reorderForResume,
	RunSessionSchema,
	SESSION_FILE,
} from "./Session";
// Naming, placement, mirror and albums
export { baseFileName, dateFolder, extensionOf, shortId, UNKNOWN_DATE_FOLDER, usableCaptureDate } from "./Naming";
export type { PlacementOutcome } from "./Placement";
export { moveFile, pathExists, placeTempFile, uniquePath } from "./Placement";
export type { MirrorDeletionOptions } from "./Mirror";
export { deleteOrphans } from "./Mirror";
export type { AlbumCollector } from "./AlbumSync";
export { ALBUM_CHUNK_SIZE, createAlbumCollector, remoteAlbumNames, syncAlbums } from "./AlbumSync";
// Sources and stores
export type { DirectoryAssetSource } from "../source/DirectoryAssetSource";
export { createDirectoryAssetSource } from "../source/DirectoryAssetSource";
export type { Manifest } from "../manifest/ManifestDatabase";
export { MANIFEST_DIR, manifestPath, openManifest } from "../manifest/ManifestDatabase";
export type { ExportController, ExportControllerOptions } from "../export/ExportController";
export { createExportController } from "../export/ExportController";
export type { ExportErrorKind, RetryConfiguration } from "../export/Retry";
export { DEFAULT_RETRY_CONFIGURATION, ExportError, StoppedByUserError } from "../export/Retry";
export type { ExistBatch, UploadPipeline, UploadPipelineOptions, UploadStats, UploadWork } from "../upload/UploadPipeline";
export { createUploadPipeline } from "../upload/UploadPipeline";
export type { RemoteClientOptions, RemoteStoreClient, UploadAssetInput } from "../remote/RemoteClient";
export { createRemoteClient, RemoteStoreError } from "../remote/RemoteClient";
