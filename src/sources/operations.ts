import path from "node:path"
import {
	type DiscoveredResources,
	type DiscoveryError,
	discoverAll,
	discoveredResources,
} from "@/discovery"
import { safeStat } from "@/io/fs"
import { commitBestEffort } from "@/repo/git"
import type { RepoHandle } from "@/repo/handle"
import {
	type ImportError,
	type ImportPolicy,
	type ImportReport,
	importResources,
} from "@/repo/import"
import { attributedToSource, listMetadata } from "@/repo/metadata"
import { removeResource } from "@/repo/store"
import type { ResourceRef } from "@/resources/types"
import type { SourceLocation } from "@/sources/id"
import {
	addSource,
	loadSourceManifest,
	type ManifestLoadError,
	removeSource,
	saveSourceManifest,
	type Source,
} from "@/sources/manifest"
import { sourceProvenance } from "@/sources/provenance"
import { createSourceResolver, type SourceResolver } from "@/sources/resolve"
import {
	deleteStateEntry,
	loadSourceState,
	saveSourceState,
	setAdded,
	type SourceStateError,
} from "@/sources/state"
import type {
	ConflictError,
	IoError,
	NotFoundError,
	Result,
	SourceUnavailableError,
	ValidationError,
} from "@/types/error"
import { removeCached } from "@/workspace/cache"

const URL_PATTERN = /^(?:https?:\/\/|git@|ssh:\/\/|git:\/\/)/i
const GH_PREFIX = "gh:"
const GITHUB_SHORTHAND = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/

/**
 * Decide whether user input names a remote or a local directory.
 *
 * URLs and `gh:owner/repo` are remote. A bare `owner/repo` is remote only when
 * no such directory exists relative to cwd. Everything else is a path.
 */
export async function parseLocation(input: string, cwd: string): Promise<SourceLocation> {
	const trimmed = input.trim()
	if (URL_PATTERN.test(trimmed)) {
		return { url: trimmed }
	}
	if (trimmed.startsWith(GH_PREFIX)) {
		return { url: `https://github.com/${trimmed.slice(GH_PREFIX.length)}` }
	}

	const resolved = path.resolve(cwd, trimmed)
	if (GITHUB_SHORTHAND.test(trimmed) && !trimmed.startsWith(".")) {
		const local = await safeStat(resolved)
		if (local.ok && local.value === null) {
			return { url: `https://github.com/${trimmed}` }
		}
	}
	return { path: resolved }
}

export interface AddSourceInput {
	location: string
	name?: string
	ref?: string
	subpath?: string
}

export interface AddSourceOptions extends ImportPolicy {
	cwd?: string
	now?: Date
	resolver?: SourceResolver
}

export interface AddSourceOutcome {
	source: Source
	discovered: DiscoveredResources
	report: ImportReport
}

export type AddSourceError =
	| ManifestLoadError
	| SourceStateError
	| ValidationError
	| ConflictError
	| SourceUnavailableError
	| DiscoveryError
	| ImportError

/**
 * Register a source and import everything it provides. The source is saved
 * even when some candidates fail, since the ones that succeeded now belong
 * to it.
 */
export async function addSourceAndImport(
	handle: RepoHandle,
	input: AddSourceInput,
	options: AddSourceOptions = {},
): Promise<Result<AddSourceOutcome, AddSourceError>> {
	const now = options.now ?? new Date()
	const manifest = await loadSourceManifest(handle)
	if (!manifest.ok) {
		return manifest
	}

	const location = await parseLocation(input.location, options.cwd ?? process.cwd())
	const added = addSource(
		manifest.value,
		{ ...location, name: input.name, ref: input.ref, subpath: input.subpath },
		now,
	)
	if (!added.ok) {
		return added
	}
	const { source } = added.value

	const resolver = options.resolver ?? createSourceResolver(handle)
	const dir = await resolver.resolve(source)
	if (!dir.ok) {
		return dir
	}

	const discovered = await discoverAll(dir.value)
	if (!discovered.ok) {
		return discovered
	}

	const imported = await importResources(handle, discoveredResources(discovered.value), {
		dryRun: options.dryRun,
		force: options.force,
		mode: source.mode,
		now,
		provenance: sourceProvenance(source),
		skipExisting: options.skipExisting,
	})

	if (!options.dryRun) {
		const saved = await saveSourceManifest(handle, added.value.manifest)
		if (!saved.ok) {
			return saved
		}

		const state = await loadSourceState(handle)
		if (!state.ok) {
			return state
		}
		const nextState = setAdded(state.value, source.name, source.id, now)
		const written = await saveSourceState(handle, nextState)
		if (!written.ok) {
			return written
		}
	}

	if (!imported.ok) {
		return imported
	}
	return { ok: true, value: { discovered: discovered.value, report: imported.value, source } }
}

export interface RemoveSourceOptions {
	keepResources?: boolean
	dryRun?: boolean
}

export interface RemoveSourceOutcome {
	source: Source
	/** Resources removed, or that would be removed on a dry run. */
	removed: ResourceRef[]
	dryRun: boolean
	warnings: string[]
}

export type RemoveSourceError =
	| ManifestLoadError
	| SourceStateError
	| NotFoundError
	| IoError
	| ValidationError

/**
 * Unregister a source and delete the resources attributed to it.
 */
export async function removeSourceAndResources(
	handle: RepoHandle,
	key: string,
	options: RemoveSourceOptions = {},
): Promise<Result<RemoveSourceOutcome, RemoveSourceError>> {
	const dryRun = Boolean(options.dryRun)
	const manifest = await loadSourceManifest(handle)
	if (!manifest.ok) {
		return manifest
	}

	const removal = removeSource(manifest.value, key)
	if (!removal.ok) {
		return removal
	}
	const source = removal.value.removed

	const warnings: string[] = []
	const owned: ResourceRef[] = []
	if (!options.keepResources) {
		const scan = await listMetadata(handle)
		if (!scan.ok) {
			return scan
		}
		warnings.push(...scan.value.warnings)
		for (const record of scan.value.records) {
			if (attributedToSource(record, source)) {
				owned.push({ name: record.name, type: record.type })
			}
		}
	}

	if (dryRun) {
		return { ok: true, value: { dryRun, removed: owned, source, warnings } }
	}

	const removed: ResourceRef[] = []
	for (const ref of owned) {
		const result = await removeResource(handle, ref)
		if (!result.ok) {
			if (result.error.type === "io") {
				return result
			}
			continue
		}
		removed.push(ref)
	}

	const saved = await saveSourceManifest(handle, removal.value.manifest)
	if (!saved.ok) {
		return saved
	}

	const state = await loadSourceState(handle)
	if (!state.ok) {
		return state
	}
	const written = await saveSourceState(handle, deleteStateEntry(state.value, source.name))
	if (!written.ok) {
		return written
	}

	if (source.url !== undefined) {
		const uncached = await removeCached(handle, source.url, source.ref)
		if (!uncached.ok) {
			warnings.push(`Could not remove cached clone: ${uncached.error.message}`)
		}
	}

	await commitBestEffort(handle, `remove source ${source.name}`, warnings)
	return { ok: true, value: { dryRun, removed, source, warnings } }
}
