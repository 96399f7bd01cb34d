import { discoverAll, discoveredResources } from "@/discovery"
import { safeLstat, safeStat } from "@/io/fs"
import { type RepoHandle, resourcePath } from "@/repo/handle"
import { importResources } from "@/repo/import"
import {
	attributedToSource,
	loadMetadata,
	type MetadataError,
	type Provenance,
	type ResourceMetadata,
} from "@/repo/metadata"
import { listResources } from "@/repo/store"
import { REPOSITORY_SOURCE_TYPE } from "@/repo/verify"
import { detectType } from "@/resources/detect"
import { getKind } from "@/resources/kinds"
import { formatResourceRef } from "@/resources/ref"
import { isSkillDir } from "@/resources/skill"
import type { Resource, ResourceLoadError, ResourceRef } from "@/resources/types"
import { computeSourceId, generateSourceName, normalizeGitUrl } from "@/sources/id"
import { loadSourceManifest, type Source } from "@/sources/manifest"
import { sourceProvenance } from "@/sources/provenance"
import { createSourceResolver, type SourceResolver } from "@/sources/resolve"
import type { AbsolutePath, ImportMode } from "@/types/branded"
import { coerceAbsolutePathDirect, coerceSourceId, coerceSourceName } from "@/types/coerce"
import type { IoError, Result, SourceUnavailableError } from "@/types/error"

const FILE_URL_PREFIX = "file://"

export interface UpdateOptions {
	dryRun?: boolean
	now?: Date
	resolver?: SourceResolver
}

/**
 * - no_metadata: nothing records where the resource came from
 * - no_source: the repository holds the only copy
 * - source_unavailable: the recorded source is gone or cannot be fetched
 */
export type SkipReason = "no_metadata" | "no_source" | "source_unavailable"

export type ResourceUpdate =
	| { status: "updated"; ref: ResourceRef; origin: string }
	| { status: "skipped"; ref: ResourceRef; reason: SkipReason; message: string }
	| { status: "failed"; ref: ResourceRef; message: string }

export interface UpdateSummary {
	results: ResourceUpdate[]
	updated: number
	failed: number
	skipped: number
	dryRun: boolean
	warnings: string[]
}

/**
 * Where a group of resources is re-imported from: a configured source, or
 * the location recorded in their metadata when no source claims them.
 */
interface Origin {
	key: string
	label: string
	provenance: Provenance
	/** null keeps each resource's current storage mode */
	mode: ImportMode | null
	resolve(): Promise<Result<AbsolutePath, SourceUnavailableError>>
}

interface OriginGroup {
	origin: Origin
	records: ResourceMetadata[]
}

/**
 * Re-import resources from where their metadata says they came from.
 * Without refs, every resource in the repository is updated.
 *
 * Resources sharing an origin are resolved and imported together. A
 * resource whose origin is gone, or that has no metadata, is skipped; one
 * its origin no longer provides fails. Only IO errors fail the call.
 */
export async function updateResources(
	handle: RepoHandle,
	refs?: ResourceRef[],
	options: UpdateOptions = {},
): Promise<Result<UpdateSummary, MetadataError>> {
	const resolver = options.resolver ?? createSourceResolver(handle)
	const manifest = await loadSourceManifest(handle)
	if (!manifest.ok) {
		return manifest
	}

	const summary: UpdateSummary = {
		dryRun: Boolean(options.dryRun),
		failed: 0,
		results: [],
		skipped: 0,
		updated: 0,
		warnings: [],
	}

	const selected = refs
		? await selectRecords(handle, refs, summary)
		: await selectAll(handle, summary)
	if (!selected.ok) {
		return selected
	}

	const groups = new Map<string, OriginGroup>()
	for (const record of selected.value) {
		if (record.source_type === REPOSITORY_SOURCE_TYPE) {
			const ref: ResourceRef = { name: record.name, type: record.type }
			summary.results.push({
				message: `'${formatResourceRef(ref)}' has no source outside the repository`,
				reason: "no_source",
				ref,
				status: "skipped",
			})
			continue
		}
		const origin = originFor(record, manifest.value.sources, resolver)
		const group = groups.get(origin.key)
		if (group) {
			group.records.push(record)
		} else {
			groups.set(origin.key, { origin, records: [record] })
		}
	}

	for (const group of groups.values()) {
		const updated = await updateGroup(handle, group, options, summary)
		if (!updated.ok) {
			return updated
		}
	}

	for (const result of summary.results) {
		summary[result.status] += 1
	}
	return { ok: true, value: summary }
}

/**
 * "2 updated, 1 failed, 0 skipped", or on a dry run
 * "2 would be updated, 1 would fail, 0 would be skipped"
 */
export function formatUpdateSummary(summary: UpdateSummary): string {
	if (summary.dryRun) {
		return `${summary.updated} would be updated, ${summary.failed} would fail, ${summary.skipped} would be skipped`
	}
	return `${summary.updated} updated, ${summary.failed} failed, ${summary.skipped} skipped`
}

async function selectAll(
	handle: RepoHandle,
	summary: UpdateSummary,
): Promise<Result<ResourceMetadata[], MetadataError>> {
	const listing = await listResources(handle)
	if (!listing.ok) {
		return listing
	}

	const records: ResourceMetadata[] = []
	for (const { metadata, resource } of listing.value.resources) {
		if (metadata) {
			records.push(metadata)
			continue
		}
		summary.results.push(noMetadata({ name: resource.name, type: resource.type }))
	}
	summary.warnings.push(...listing.value.warnings)
	return { ok: true, value: records }
}

async function selectRecords(
	handle: RepoHandle,
	refs: ResourceRef[],
	summary: UpdateSummary,
): Promise<Result<ResourceMetadata[], IoError>> {
	const records: ResourceMetadata[] = []
	for (const ref of refs) {
		const record = await loadMetadata(handle, ref.type, ref.name)
		if (!record.ok) {
			if (record.error.type === "io") {
				return { error: record.error, ok: false }
			}
			summary.results.push({ message: record.error.message, ref, status: "failed" })
			continue
		}
		if (!record.value) {
			summary.results.push(noMetadata(ref))
			continue
		}
		records.push(record.value)
	}
	return { ok: true, value: records }
}

function noMetadata(ref: ResourceRef): ResourceUpdate {
	return {
		message: `'${formatResourceRef(ref)}' has no metadata recording its source`,
		reason: "no_metadata",
		ref,
		status: "skipped",
	}
}

function originFor(
	record: ResourceMetadata,
	sources: Source[],
	resolver: SourceResolver,
): Origin {
	const configured = sources.find((source) => attributedToSource(record, source))
	if (configured) {
		return {
			key: `source:${configured.id}`,
			label: configured.name,
			mode: configured.mode,
			provenance: sourceProvenance(configured),
			resolve: () => resolver.resolve(configured),
		}
	}

	const provenance: Provenance = {
		ref: record.ref,
		sourceId: record.source_id,
		sourceName: record.source_name,
		sourceType: record.source_type,
		sourceUrl: record.source_url,
	}

	if (record.source_url.startsWith(FILE_URL_PREFIX)) {
		const location = record.source_url.slice(FILE_URL_PREFIX.length)
		return {
			key: `path:${location}`,
			label: location,
			mode: null,
			provenance,
			resolve: () => resolveLocalPath(location, record.source_name ?? location),
		}
	}

	const url = record.source_url
	const transient: Source = {
		id: coerceSourceId(record.source_id ?? "") ?? computeSourceId({ url }),
		mode: "copy",
		name: coerceSourceName(record.source_name ?? "") ?? generateSourceName({ url }),
		ref: record.ref,
		url,
	}
	return {
		key: `url:${normalizeGitUrl(url)}@${record.ref ?? ""}`,
		label: url,
		mode: transient.mode,
		provenance,
		resolve: () => resolver.resolve(transient),
	}
}

async function resolveLocalPath(
	location: string,
	source: string,
): Promise<Result<AbsolutePath, SourceUnavailableError>> {
	const unavailable = (message: string): { ok: false; error: SourceUnavailableError } => ({
		error: { location, message, source, type: "source_unavailable" },
		ok: false,
	})

	const local = coerceAbsolutePathDirect(location)
	if (!local) {
		return unavailable(`source path ${location} is not absolute`)
	}
	const stats = await safeStat(local)
	if (!stats.ok) {
		return unavailable(stats.error.message)
	}
	if (!stats.value) {
		return unavailable(`source path ${location} no longer exists`)
	}
	return { ok: true, value: local }
}

async function updateGroup(
	handle: RepoHandle,
	group: OriginGroup,
	options: UpdateOptions,
	summary: UpdateSummary,
): Promise<Result<void, IoError>> {
	const { origin, records } = group
	const refs = records.map((record): ResourceRef => ({ name: record.name, type: record.type }))

	const root = await origin.resolve()
	if (!root.ok) {
		for (const ref of refs) {
			summary.results.push({
				message: root.error.message,
				reason: "source_unavailable",
				ref,
				status: "skipped",
			})
		}
		return { ok: true, value: undefined }
	}

	const provided = await locateResources(root.value, summary.warnings)
	if (!provided.ok) {
		for (const ref of refs) {
			summary.results.push({ message: provided.error.message, ref, status: "failed" })
		}
		return { ok: true, value: undefined }
	}

	const byMode = new Map<ImportMode, Resource[]>()
	const refsByPath = new Map<string, ResourceRef>()
	for (const ref of refs) {
		const resource = provided.value.get(formatResourceRef(ref))
		if (!resource) {
			summary.results.push({
				message: `'${formatResourceRef(ref)}' is no longer provided by ${origin.label}`,
				ref,
				status: "failed",
			})
			continue
		}

		const mode = origin.mode ?? (await storedMode(handle, ref))
		if (typeof mode !== "string") {
			return mode
		}
		byMode.set(mode, [...(byMode.get(mode) ?? []), resource])
		refsByPath.set(resource.path, ref)
	}

	for (const [mode, resources] of byMode) {
		const imported = await importResources(handle, resources, {
			dryRun: options.dryRun,
			force: true,
			mode,
			now: options.now,
			provenance: origin.provenance,
		})
		if (!imported.ok && imported.error.type === "io") {
			return { error: imported.error, ok: false }
		}
		const report = imported.ok ? imported.value : imported.error.report
		summary.warnings.push(...report.warnings)
		for (const added of report.added) {
			summary.results.push({ origin: origin.label, ref: added.ref, status: "updated" })
		}
		for (const failed of report.failed) {
			const ref = refsByPath.get(failed.path)
			if (ref) {
				summary.results.push({ message: failed.message, ref, status: "failed" })
			}
		}
	}

	return { ok: true, value: undefined }
}

/**
 * Resources an origin provides, keyed by ref. A file or skill directory
 * provides itself; any other directory is searched.
 */
async function locateResources(
	root: AbsolutePath,
	warnings: string[],
): Promise<Result<Map<string, Resource>, ResourceLoadError>> {
	const provided = new Map<string, Resource>()
	const stats = await safeStat(root)
	if (!stats.ok) {
		return stats
	}

	if (stats.value?.isDirectory() && !(await isSkillDir(root))) {
		const discovered = await discoverAll(root)
		if (!discovered.ok) {
			return discovered
		}
		for (const issue of discovered.value.issues) {
			warnings.push(issue.message)
		}
		for (const resource of discoveredResources(discovered.value)) {
			provided.set(formatResourceRef(resource), resource)
		}
		return { ok: true, value: provided }
	}

	const type = await detectType(root)
	if (!type.ok) {
		return type
	}
	const loaded = await getKind(type.value).load(root)
	if (!loaded.ok) {
		return loaded
	}
	provided.set(formatResourceRef(loaded.value), loaded.value)
	return { ok: true, value: provided }
}

async function storedMode(
	handle: RepoHandle,
	ref: ResourceRef,
): Promise<ImportMode | { ok: false; error: IoError }> {
	const stats = await safeLstat(resourcePath(handle, ref.type, ref.name))
	if (!stats.ok) {
		return stats
	}
	return stats.value?.isSymbolicLink() ? "symlink" : "copy"
}
