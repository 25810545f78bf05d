/**
 * Directory-backed Asset Source.
 *
 * Every image or video under the root is an item whose id is its POSIX path relative to the root,
 * without extension. Files that share a directory and stem are folded into one item: a video next to
 * an image becomes the image's paired video (a live photo), an `.aae` or `.xmp` file becomes its
 * adjustment data. The first-level directory a file lives in is its album.
 */

import { getLog } from "../shared/logger";
import type {
	AlbumRef,
	AssetSource,
	CandidateItem,
	ListItemsFilter,
	ProgressReporter,
	Variant,
	VariantType,
} from "../sync/Types";
import { createReadStream, createWriteStream, type Stats } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { basename, extname, join, posix, relative, sep } from "node:path";
import { pipeline } from "node:stream/promises";
import mime from "mime-types";

const log = getLog(import.meta);

const SIDECAR_EXTENSIONS = new Set([".aae", ".xmp"]);

/** Resource tags as the Photos framework numbers them */
export const RESOURCE_TYPES: Record<VariantType, number> = {
	original: 1,
	video: 2,
	adjustments: 7,
	pairedVideo: 9,
};

type FileKind = "image" | "video" | "sidecar";

type ScannedFile = {
	absPath: string;
	/** POSIX, relative to the root */
	relPath: string;
	kind: FileKind;
	stats: Stats;
};

type Group = {
	id: string;
	image?: ScannedFile;
	video?: ScannedFile;
	sidecar?: ScannedFile;
};

export function classifyFile(name: string): FileKind | undefined {
	const ext = extname(name).toLowerCase();
	if (SIDECAR_EXTENSIONS.has(ext)) {
		return "sidecar";
	}
	const type = mime.lookup(name);
	if (type === false) {
		return;
	}
	if (type.startsWith("image/")) {
		return "image";
	}
	if (type.startsWith("video/")) {
		return "video";
	}
	return;
}

function toPosix(path: string): string {
	return path.split(sep).join(posix.sep);
}

function captureTime(stats: Stats): Date {
	return stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime;
}

export interface DirectoryAssetSource extends AssetSource {
	readonly root: string;
}

export function createDirectoryAssetSource(root: string): DirectoryAssetSource {
	// item id -> variant type -> absolute path, refreshed by every listItems call
	let paths = new Map<string, Map<VariantType, string>>();

	return { root, listItems, exportVariant, renderEdited, listAlbums };

	async function scan(): Promise<Array<ScannedFile>> {
		const files: Array<ScannedFile> = [];
		const walk = async (dir: string): Promise<void> => {
			const entries = await readdir(dir, { withFileTypes: true });
			entries.sort((a, b) => a.name.localeCompare(b.name));
			for (const entry of entries) {
				if (entry.name.startsWith(".")) {
					continue;
				}
				const absPath = join(dir, entry.name);
				if (entry.isDirectory()) {
					await walk(absPath);
					continue;
				}
				if (!entry.isFile()) {
					continue;
				}
				const kind = classifyFile(entry.name);
				if (!kind) {
					continue;
				}
				files.push({ absPath, relPath: toPosix(relative(root, absPath)), kind, stats: await stat(absPath) });
			}
		};
		await walk(root);
		return files;
	}

	function groupFiles(files: Array<ScannedFile>): Array<Group> {
		const groups = new Map<string, Group>();
		for (const file of files) {
			const ext = extname(file.relPath);
			const stemKey = file.relPath.slice(0, file.relPath.length - ext.length);
			const key = stemKey.toLowerCase();
			const group = groups.get(key) ?? { id: stemKey };
			if (!group[file.kind]) {
				group[file.kind] = file;
			} else {
				log.debug("ignoring second %s for %s: %s", file.kind, stemKey, file.relPath);
			}
			groups.set(key, group);
		}
		return [...groups.values()];
	}

	function toItem(group: Group): CandidateItem | undefined {
		const primary = group.image ?? group.video;
		if (!primary) {
			return;
		}
		const variantPaths = new Map<VariantType, string>();
		const variants: Array<Variant> = [];
		const add = (type: VariantType, file: ScannedFile) => {
			variants.push({ type, filename: basename(file.absPath), resourceType: RESOURCE_TYPES[type] });
			variantPaths.set(type, file.absPath);
		};

		const isLivePhoto = Boolean(group.image && group.video);
		if (group.image) {
			add("original", group.image);
			if (group.video) {
				add("pairedVideo", group.video);
			}
		} else if (group.video) {
			add("video", group.video);
		}
		if (group.sidecar) {
			add("adjustments", group.sidecar);
		}
		paths.set(group.id, variantPaths);

		const segments = group.id.split("/");
		const albums: Array<AlbumRef> = segments.length > 1 ? [{ id: segments[0], title: segments[0] }] : [];
		return {
			id: group.id,
			createdAt: captureTime(primary.stats),
			modifiedAt: primary.stats.mtime,
			kind: group.image ? "image" : "video",
			isLivePhoto,
			variants,
			albums,
		};
	}

	async function listItems(filter: ListItemsFilter): Promise<Array<CandidateItem>> {
		paths = new Map();
		const items: Array<CandidateItem> = [];
		for (const group of groupFiles(await scan())) {
			const item = toItem(group);
			if (!item) {
				continue;
			}
			if (filter.media === "images" && item.kind !== "image") {
				continue;
			}
			if (filter.media === "videos" && item.kind !== "video") {
				continue;
			}
			if (filter.since && item.createdAt && item.createdAt < filter.since) {
				continue;
			}
			items.push(item);
		}
		log.debug("listed %d item(s) under %s", items.length, root);
		return items;
	}

	function pathOf(item: CandidateItem, type: VariantType): string {
		const path = paths.get(item.id)?.get(type);
		if (!path) {
			throw Object.assign(new Error(`No ${type} resource for ${item.id}`), { code: "ENOENT" });
		}
		return path;
	}

	async function copyWithProgress(
		from: string,
		destPath: string,
		onProgress: ProgressReporter,
		signal: AbortSignal,
	): Promise<void> {
		const { size } = await stat(from);
		let copied = 0;
		const input = createReadStream(from);
		input.on("data", chunk => {
			copied += chunk.length;
			if (size > 0 && copied < size) {
				onProgress(copied / size);
			}
		});
		await pipeline(input, createWriteStream(destPath), { signal });
		onProgress(1);
	}

	async function exportVariant(
		item: CandidateItem,
		variant: Variant,
		destPath: string,
		onProgress: ProgressReporter,
		signal: AbortSignal,
	): Promise<void> {
		await copyWithProgress(pathOf(item, variant.type), destPath, onProgress, signal);
	}

	// There is no edit history on disk; the rendered edit is the original image.
	async function renderEdited(
		item: CandidateItem,
		destPath: string,
		onProgress: ProgressReporter,
		signal: AbortSignal,
	): Promise<void> {
		await copyWithProgress(pathOf(item, "original"), destPath, onProgress, signal);
	}

	async function listAlbums(): Promise<Array<AlbumRef>> {
		const entries = await readdir(root, { withFileTypes: true });
		const albums: Array<AlbumRef> = [];
		for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
			if (entry.isDirectory() && !entry.name.startsWith(".")) {
				albums.push({ id: entry.name, title: entry.name });
			}
		}
		return albums;
	}
}
