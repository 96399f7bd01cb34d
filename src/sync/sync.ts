import { discoverAll, type DiscoveredResources, discoveredResources } from "@/discovery"
import { commitBestEffort } from "@/repo/git"
import type { RepoHandle } from "@/repo/handle"
import { importResources } from "@/repo/import"
import { attributedToSource, listMetadata, loadMetadata } from "@/repo/metadata"
import { removeResource } from "@/repo/store"
import { formatResourceRef } from "@/resources/ref"
import type { ResourceRef } from "@/resources/types"
import { loadSourceManifest, type ManifestLoadError, type Source } from "@/sources/manifest"
import { sourceProvenance } from "@/sources/provenance"
import { createSourceResolver, type SourceResolver } from "@/sources/resolve"
import {
	loadSourceState,
	saveSourceState,
	setLastSynced,
	type SourceState,
	type SourceStateError,
} from "@/sources/state"
import { failSource } from "@/sync/errors"
import type {
	OrphanedResource,
	SourceFailure,
	SourceSyncResult,
	SyncFailure,
	SyncOptions,
	SyncSummary,
} from "@/sync/types"
import type { IoError, Result } from "@/types/error"

/**
 * Re-import every source in manifest order and detect resources that
 * vanished from them.
 *
 * A source that cannot be resolved, scanned or imported is recorded as failed
 * and skipped: it takes no part in orphan detection and keeps its previous
 * sync time. The call fails only when every source fails.
 */
export async function runSync(
	handle: RepoHandle,
	options: SyncOptions = {},
): Promise<Result<SyncSummary, SyncFailure | ManifestLoadError | SourceStateError>> {
	const dryRun = Boolean(options.dryRun)
	const now = options.now ?? new Date()
	const resolver = options.resolver ?? createSourceResolver(handle)

	const manifest = await loadSourceManifest(handle)
	if (!manifest.ok) {
		return manifest
	}

	const state = await loadSourceState(handle)
	if (!state.ok) {
		return state
	}

	const summary: SyncSummary = {
		dryRun,
		failed: 0,
		orphans: [],
		removed: [],
		sources: [],
		synced: 0,
		warnings: [],
	}

	let nextState: SourceState = state.value
	for (const source of manifest.value.sources) {
		const result = await syncSource(handle, source, resolver, options, summary.warnings)
		summary.sources.push(result)
		if (result.status === "failed") {
			summary.failed += 1
			continue
		}

		summary.synced += 1
		summary.orphans.push(
			...result.orphans.map((ref) => ({ ref, source: source.name, sourceId: source.id })),
		)
		if (!dryRun) {
			nextState = setLastSynced(nextState, source.name, now)
		}
	}

	if (summary.sources.length > 0 && summary.synced === 0) {
		return {
			error: {
				failed: summary.failed,
				message: "all sources failed to sync",
				summary,
				type: "sync",
			},
			ok: false,
		}
	}

	if (!dryRun && summary.synced > 0) {
		const saved = await saveSourceState(handle, nextState)
		if (!saved.ok) {
			return saved
		}
	}

	if (!dryRun && options.prune !== false) {
		const pruned = await pruneOrphans(handle, summary.orphans, summary.warnings)
		if (!pruned.ok) {
			return pruned
		}
		summary.removed = pruned.value
		if (pruned.value.length > 0) {
			await commitBestEffort(
				handle,
				`sync: remove ${pruned.value.length} resource(s) no longer in sources`,
				summary.warnings,
			)
		}
	}

	return { ok: true, value: summary }
}

/**
 * "Sync Complete: 2/3 sources synced, 1 resource(s) removed"
 */
export function formatSyncSummary(summary: SyncSummary): string {
	const total = summary.synced + summary.failed
	return `Sync Complete: ${summary.synced}/${total} sources synced, ${summary.removed.length} resource(s) removed`
}

async function syncSource(
	handle: RepoHandle,
	source: Source,
	resolver: SourceResolver,
	options: SyncOptions,
	warnings: string[],
): Promise<SourceSyncResult> {
	const failed = (failure: SourceFailure): SourceSyncResult => ({
		failure,
		source: source.name,
		sourceId: source.id,
		status: "failed",
	})

	const dir = await resolver.resolve(source)
	if (!dir.ok) {
		return failed(failSource("resolve", dir.error))
	}

	const before = await listMetadata(handle)
	if (!before.ok) {
		return failed(failSource("inventory", before.error))
	}
	warnings.push(...before.value.warnings)
	const inventory = before.value.records
		.filter((record) => attributedToSource(record, source))
		.map((record): ResourceRef => ({ name: record.name, type: record.type }))

	const discovered = await discoverAll(dir.value)
	if (!discovered.ok) {
		return failed(failSource("discover", discovered.error))
	}
	for (const issue of discovered.value.issues) {
		warnings.push(`${source.name}: ${issue.message}`)
	}

	const imported = await importResources(handle, discoveredResources(discovered.value), {
		dryRun: options.dryRun,
		force: !options.skipExisting,
		mode: source.mode,
		now: options.now,
		provenance: sourceProvenance(source),
		skipExisting: options.skipExisting,
	})
	if (!imported.ok) {
		return failed(failSource("import", imported.error))
	}

	// Scan again rather than trusting the import report: skipped and failed
	// candidates are still present in the source.
	const after = await discoverAll(dir.value)
	if (!after.ok) {
		return failed(failSource("rescan", after.error))
	}
	const present = refKeys(after.value)

	return {
		import: imported.value,
		orphans: inventory.filter((ref) => !present.has(formatResourceRef(ref))),
		source: source.name,
		sourceId: source.id,
		status: "synced",
	}
}

function refKeys(discovered: DiscoveredResources): Set<string> {
	return new Set(
		discoveredResources(discovered).map((resource) =>
			formatResourceRef({ name: resource.name, type: resource.type }),
		),
	)
}

/**
 * Remove orphans that still belong to the source that lost them. A later
 * source may have imported a resource of the same name in the meantime.
 */
async function pruneOrphans(
	handle: RepoHandle,
	orphans: OrphanedResource[],
	warnings: string[],
): Promise<Result<ResourceRef[], IoError>> {
	const removed: ResourceRef[] = []
	for (const orphan of orphans) {
		const metadata = await loadMetadata(handle, orphan.ref.type, orphan.ref.name)
		if (!metadata.ok) {
			if (metadata.error.type === "io") {
				return { error: metadata.error, ok: false }
			}
			warnings.push(metadata.error.message)
			continue
		}
		const current = metadata.value
		if (current && !attributedToSource(current, { id: orphan.sourceId, name: orphan.source })) {
			continue
		}

		const result = await removeResource(handle, orphan.ref)
		if (!result.ok) {
			if (result.error.type === "io") {
				return { error: result.error, ok: false }
			}
			// Already gone.
			continue
		}
		removed.push(orphan.ref)
	}
	return { ok: true, value: removed }
}
