import {
	copyPath,
	createSymlink,
	ensureDir,
	readDirEntries,
	removePath,
	safeLstat,
	safeStat,
} from "@/io/fs"
import type { IoResult } from "@/io/fs"
import { type RepoHandle, resourcePath, typeDir } from "@/repo/handle"
import {
	deleteMetadata,
	listMetadata,
	loadMetadata,
	type MetadataError,
	type ResourceMetadata,
} from "@/repo/metadata"
import { getKind } from "@/resources/kinds"
import { MARKDOWN_EXTENSION } from "@/resources/markdown"
import { PACKAGE_EXTENSION } from "@/resources/package"
import { formatResourceRef } from "@/resources/ref"
import type { Resource, ResourceLoadError, ResourceRef } from "@/resources/types"
import {
	type AbsolutePath,
	type ImportMode,
	RESOURCE_TYPES,
	type ResourceType,
} from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { IoError, NotFoundError, Result } from "@/types/error"

export interface StoredResource {
	resource: Resource
	/** null when the resource is an orphaned file */
	metadata: ResourceMetadata | null
}

export interface ResourceListing {
	resources: StoredResource[]
	warnings: string[]
}

export interface RemovalOutcome {
	ref: ResourceRef
	removedFile: boolean
	removedMetadata: boolean
}

/**
 * Whether anything occupies the resource's storage path. A dangling
 * symlink counts as present.
 */
export async function resourceExists(
	handle: RepoHandle,
	ref: ResourceRef,
): Promise<IoResult<boolean>> {
	const stats = await safeLstat(resourcePath(handle, ref.type, ref.name))
	if (!stats.ok) {
		return stats
	}
	return { ok: true, value: stats.value !== null }
}

export async function getResource(
	handle: RepoHandle,
	ref: ResourceRef,
): Promise<Result<Resource, ResourceLoadError>> {
	const target = resourcePath(handle, ref.type, ref.name)
	const exists = await resourceExists(handle, ref)
	if (!exists.ok) {
		return exists
	}
	if (!exists.value) {
		return {
			error: {
				message: `Resource '${formatResourceRef(ref)}' not found in repository.`,
				path: target,
				target: ref.type,
				type: "not_found",
			},
			ok: false,
		}
	}

	return getKind(ref.type).load(target, { baseDir: typeDir(handle, ref.type) })
}

/**
 * Place a resource at its storage path, either as a symlink to the source or
 * as a copy. The destination must be free.
 */
export async function storeResource(
	handle: RepoHandle,
	resource: Resource,
	mode: ImportMode,
): Promise<IoResult<AbsolutePath>> {
	const kind = getKind(resource.type)
	const destination = resourcePath(handle, resource.type, resource.name)

	const parent = await ensureDir(joinAbsolute(destination, ".."))
	if (!parent.ok) {
		return parent
	}

	const written =
		mode === "symlink"
			? await createSymlink(resource.path, destination, kind.entry)
			: await copyPath(resource.path, destination)
	if (!written.ok) {
		return written
	}

	return { ok: true, value: destination }
}

/**
 * Remove a resource and its metadata. Either one alone is enough; the call
 * fails with not_found only when neither exists.
 */
export async function removeResource(
	handle: RepoHandle,
	ref: ResourceRef,
): Promise<Result<RemovalOutcome, IoError | NotFoundError>> {
	const target = resourcePath(handle, ref.type, ref.name)
	const exists = await resourceExists(handle, ref)
	if (!exists.ok) {
		return exists
	}

	if (exists.value) {
		const removed = await removePath(target)
		if (!removed.ok) {
			return removed
		}
	}

	const metadataRemoved = await deleteMetadata(handle, ref.type, ref.name)
	if (!metadataRemoved.ok) {
		return metadataRemoved
	}

	if (!exists.value && !metadataRemoved.value) {
		return {
			error: {
				message: `Resource '${formatResourceRef(ref)}' not found.`,
				path: target,
				target: ref.type,
				type: "not_found",
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: { ref, removedFile: exists.value, removedMetadata: metadataRemoved.value },
	}
}

/**
 * List stored resources with their metadata, sorted by type then name.
 *
 * Two inconsistencies are reported as warnings rather than errors:
 * a resource without metadata (listed, provenance unknown) and metadata
 * without a resource (not listed).
 */
export async function listResources(
	handle: RepoHandle,
	type?: ResourceType,
): Promise<Result<ResourceListing, IoError | MetadataError>> {
	const types = type ? [type] : RESOURCE_TYPES
	const resources: StoredResource[] = []
	const warnings: string[] = []

	for (const current of types) {
		const entries = await listEntryPaths(handle, current)
		if (!entries.ok) {
			return entries
		}

		const loaded: Resource[] = []
		for (const entryPath of entries.value) {
			const resource = await getKind(current).load(entryPath, {
				baseDir: typeDir(handle, current),
			})
			if (!resource.ok) {
				if (resource.error.type === "io") {
					return { error: resource.error, ok: false }
				}
				warnings.push(`skipping invalid ${current} at ${entryPath}: ${resource.error.message}`)
				continue
			}
			loaded.push(resource.value)
		}

		loaded.sort((a, b) => a.name.localeCompare(b.name))
		for (const resource of loaded) {
			const metadata = await loadMetadata(handle, current, resource.name)
			if (!metadata.ok) {
				if (metadata.error.type === "io") {
					return { error: metadata.error, ok: false }
				}
				warnings.push(metadata.error.message)
			}
			const record = metadata.ok ? metadata.value : null
			if (!record) {
				warnings.push(orphanedFileWarning({ name: resource.name, type: current }))
			}
			resources.push({ metadata: record, resource })
		}

		const scan = await listMetadata(handle, current)
		if (!scan.ok) {
			return scan
		}
		warnings.push(...scan.value.warnings)
		for (const record of scan.value.records) {
			const present = await safeLstat(resourcePath(handle, current, record.name))
			if (!present.ok) {
				return present
			}
			if (!present.value) {
				warnings.push(orphanedMetadataWarning({ name: record.name, type: current }))
			}
		}
	}

	return { ok: true, value: { resources, warnings } }
}

export function orphanedFileWarning(ref: ResourceRef): string {
	return `orphaned file detected: ${ref.type} '${ref.name}' has no metadata`
}

export function orphanedMetadataWarning(ref: ResourceRef): string {
	return `orphaned metadata detected: ${ref.type} '${ref.name}' has no resource file`
}

const MAX_LIST_DEPTH = 10

async function listEntryPaths(
	handle: RepoHandle,
	type: ResourceType,
): Promise<IoResult<AbsolutePath[]>> {
	const dir = typeDir(handle, type)
	switch (type) {
		case "command":
		case "agent":
			return collectFiles(dir, MARKDOWN_EXTENSION, MAX_LIST_DEPTH)
		case "package":
			// Package files are stored flat.
			return collectFiles(dir, PACKAGE_EXTENSION, 0)
		case "skill":
			return collectSkillDirs(dir)
	}
}

/**
 * Files with the extension under dir. Symlinks are followed when deciding
 * whether an entry is a file or a directory; dangling links are kept so
 * the loader can report them.
 */
async function collectFiles(
	dir: AbsolutePath,
	extension: string,
	remainingDepth: number,
): Promise<IoResult<AbsolutePath[]>> {
	const entries = await readDirEntries(dir)
	if (!entries.ok) {
		return entries
	}

	const files: AbsolutePath[] = []
	for (const entry of entries.value) {
		const entryPath = joinAbsolute(dir, entry.name)
		const stats = await safeStat(entryPath)
		if (!stats.ok) {
			return stats
		}

		if (stats.value?.isDirectory()) {
			if (remainingDepth <= 0) {
				continue
			}
			const nested = await collectFiles(entryPath, extension, remainingDepth - 1)
			if (!nested.ok) {
				return nested
			}
			files.push(...nested.value)
			continue
		}

		if (entry.name.endsWith(extension)) {
			files.push(entryPath)
		}
	}

	return { ok: true, value: files }
}

async function collectSkillDirs(dir: AbsolutePath): Promise<IoResult<AbsolutePath[]>> {
	const entries = await readDirEntries(dir)
	if (!entries.ok) {
		return entries
	}

	const dirs: AbsolutePath[] = []
	for (const entry of entries.value) {
		if (entry.name.startsWith(".")) {
			continue
		}
		const entryPath = joinAbsolute(dir, entry.name)
		if (entry.isDirectory() || entry.isSymbolicLink()) {
			dirs.push(entryPath)
		}
	}
	return { ok: true, value: dirs }
}
