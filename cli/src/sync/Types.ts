// Shared types of the sync engine: candidate items, the asset source seam, run options and progress events

import type { RetryConfiguration } from "../export/Retry";
import type { UploadPipelineOptions } from "../upload/UploadPipeline";

// =============================================================================
// Source items
// =============================================================================

export type MediaKind = "image" | "video";

export type VariantType = "original" | "pairedVideo" | "video" | "adjustments";

/** Variants plus the rendered edit, which the source produces on request. */
export type ExportVariantType = VariantType | "edited";

export interface Variant {
	readonly type: VariantType;
	/** Resource name as the source knows it */
	readonly filename: string;
	/** Numeric resource tag carried into upload metadata */
	readonly resourceType: number;
}

export interface AlbumRef {
	readonly id: string;
	readonly title: string;
}

export interface CandidateItem {
	readonly id: string;
	readonly createdAt?: Date;
	readonly modifiedAt?: Date;
	readonly kind: MediaKind;
	readonly isLivePhoto: boolean;
	readonly isFavorite?: boolean;
	readonly durationSeconds?: number;
	readonly variants: ReadonlyArray<Variant>;
	readonly albums: ReadonlyArray<AlbumRef>;
}

export type MediaFilter = "all" | "images" | "videos";

export interface ListItemsFilter {
	media: MediaFilter;
	since?: Date;
}

/** Fraction in [0, 1] */
export type ProgressReporter = (progress: number) => void;

/**
 * Where media comes from. Implementations write bytes to `destPath` and must honour `signal`.
 */
export interface AssetSource {
	listItems(filter: ListItemsFilter): Promise<Array<CandidateItem>>;
	exportVariant(
		item: CandidateItem,
		variant: Variant,
		destPath: string,
		onProgress: ProgressReporter,
		signal: AbortSignal,
	): Promise<void>;
	renderEdited(item: CandidateItem, destPath: string, onProgress: ProgressReporter, signal: AbortSignal): Promise<void>;
	listAlbums(): Promise<Array<AlbumRef>>;
}

// =============================================================================
// Run options and results
// =============================================================================

export type ExportMode = "originals" | "edited" | "both";
export type SortOrder = "oldest" | "newest";
export type BackupMode = "full" | "smartIncremental" | "mirror";
export type AlbumScope = "all" | { albumIds: ReadonlyArray<string> };

export interface UploadTarget {
	serverUrl: string;
	apiKey: string;
	pipeline: UploadPipelineOptions;
}

export interface SyncOptions {
	mode: ExportMode;
	media: MediaFilter;
	since?: Date;
	limit?: number;
	sortOrder: SortOrder;
	albumScope: AlbumScope;
	backupMode: BackupMode;
	includeAdjustmentData: boolean;
	dryRun: boolean;
	folderDestination?: string;
	upload?: UploadTarget;
	retry: RetryConfiguration;
	requestTimeoutMs: number;
	downloadTimeoutMultiplier: number;
	/** Working directory for in-flight downloads */
	tempDir: string;
	/** Where sessions and failed-upload records live */
	stateDir: string;
}

export interface RunResult {
	runId: string;
	attempted: number;
	completed: number;
	skipped: number;
	errorCount: number;
	wasPaused: boolean;
	pauseIndex?: number;
	processedIds: Array<string>;
	errorIds: Array<string>;
	mirrorDeleted: number;
}

// =============================================================================
// Progress events
// =============================================================================

export type ProgressEvent =
	| { type: "scanning" }
	| { type: "willExport"; total: number }
	| { type: "exporting"; index: number; total: number; itemId: string; baseName: string; kind: MediaKind }
	| { type: "message"; text: string }
	| { type: "downloading"; itemId: string; baseName: string; progress: number; attempt: number }
	| {
			type: "retrying";
			itemId: string;
			baseName: string;
			attempt: number;
			maxAttempts: number;
			delayMs: number;
			reason: string;
	  }
	| { type: "existenceCheck"; checked: number; total: number }
	| { type: "paused"; at: number; total: number }
	| { type: "fileScanning" }
	| { type: "fileWillCopy"; total: number }
	| { type: "fileCopying"; index: number; total: number; relPath: string };

export type ProgressListener = (event: ProgressEvent) => void;

export type ProgressEventOf<T extends ProgressEvent["type"]> = Extract<ProgressEvent, { type: T }>;
