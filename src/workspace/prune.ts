import { readDirEntries, removePath, safeLstat } from "@/io/fs"
import type { IoResult } from "@/io/fs"
import type { RepoHandle } from "@/repo/handle"
import { listMetadata, type MetadataError } from "@/repo/metadata"
import { loadSourceManifest } from "@/sources/manifest"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { Result } from "@/types/error"
import { cacheDirFor } from "@/workspace/cache"

const GIT_SOURCE_TYPES = new Set(["github", "git-url"])

export interface CachedCheckout {
	name: string
	path: AbsolutePath
	sizeBytes: number
}

export interface PruneOptions {
	dryRun?: boolean
}

export interface PruneReport {
	unreferenced: CachedCheckout[]
	removed: CachedCheckout[]
	dryRun: boolean
}

/**
 * Checkouts under .workspace that no configured source and no resource's
 * recorded origin maps to.
 */
export async function findUnreferencedCaches(
	handle: RepoHandle,
): Promise<Result<CachedCheckout[], MetadataError>> {
	const manifest = await loadSourceManifest(handle)
	if (!manifest.ok) {
		return manifest
	}
	const records = await listMetadata(handle)
	if (!records.ok) {
		return records
	}

	const referenced = new Set<string>()
	for (const source of manifest.value.sources) {
		if (source.url !== undefined) {
			referenced.add(cacheDirFor(handle, source.url, source.ref))
		}
	}
	for (const record of records.value.records) {
		if (GIT_SOURCE_TYPES.has(record.source_type)) {
			referenced.add(cacheDirFor(handle, record.source_url, record.ref))
		}
	}

	const entries = await readDirEntries(handle.workspaceDir)
	if (!entries.ok) {
		return entries
	}

	const unreferenced: CachedCheckout[] = []
	for (const entry of entries.value) {
		const entryPath = joinAbsolute(handle.workspaceDir, entry.name)
		if (!entry.isDirectory() || referenced.has(entryPath)) {
			continue
		}
		const size = await directorySize(entryPath)
		if (!size.ok) {
			return size
		}
		unreferenced.push({ name: entry.name, path: entryPath, sizeBytes: size.value })
	}
	return { ok: true, value: unreferenced }
}

/**
 * Delete unreferenced checkouts. Resources are never touched; a later sync
 * of a source whose checkout was removed clones it again.
 */
export async function pruneWorkspace(
	handle: RepoHandle,
	options: PruneOptions = {},
): Promise<Result<PruneReport, MetadataError>> {
	const found = await findUnreferencedCaches(handle)
	if (!found.ok) {
		return found
	}

	const report: PruneReport = {
		dryRun: Boolean(options.dryRun),
		removed: [],
		unreferenced: found.value,
	}
	if (report.dryRun) {
		return { ok: true, value: report }
	}

	for (const checkout of found.value) {
		const removed = await removePath(checkout.path)
		if (!removed.ok) {
			return removed
		}
		report.removed.push(checkout)
	}
	return { ok: true, value: report }
}

/**
 * "512 B", "1.5 KB", "12.0 MB"
 */
export function formatSize(bytes: number): string {
	const unit = 1024
	if (bytes < unit) {
		return `${bytes} B`
	}
	const prefixes = ["K", "M", "G", "T"]
	let value = bytes / unit
	let index = 0
	while (value >= unit && index < prefixes.length - 1) {
		value /= unit
		index += 1
	}
	return `${value.toFixed(1)} ${prefixes[index]}B`
}

async function directorySize(dir: AbsolutePath): Promise<IoResult<number>> {
	const entries = await readDirEntries(dir)
	if (!entries.ok) {
		return entries
	}

	let total = 0
	for (const entry of entries.value) {
		const entryPath = joinAbsolute(dir, entry.name)
		if (entry.isDirectory()) {
			const nested = await directorySize(entryPath)
			if (!nested.ok) {
				return nested
			}
			total += nested.value
			continue
		}
		const stats = await safeLstat(entryPath)
		if (!stats.ok) {
			return stats
		}
		total += Number(stats.value?.size ?? 0)
	}
	return { ok: true, value: total }
}
