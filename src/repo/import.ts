import { discoverAll, discoveredResources, type DiscoveryIssue } from "@/discovery"
import { removePath, safeStat } from "@/io/fs"
import { commitBestEffort } from "@/repo/git"
import { metadataPath, type RepoHandle, resourcePath } from "@/repo/handle"
import {
	buildMetadata,
	loadMetadata,
	metadataOwner,
	type Provenance,
	saveMetadata,
} from "@/repo/metadata"
import { resourceExists, storeResource } from "@/repo/store"
import { detectType } from "@/resources/detect"
import { getKind } from "@/resources/kinds"
import { formatResourceRef } from "@/resources/ref"
import { isSkillDir } from "@/resources/skill"
import type { Resource, ResourceRef } from "@/resources/types"
import {
	type AbsolutePath,
	type ImportMode,
	RESOURCE_TYPES,
	type ResourceName,
	type ResourceType,
} from "@/types/branded"
import type { AppError, ConflictError, IoError, Result } from "@/types/error"

export interface ImportPolicy {
	/** Overwrite resources that already exist. */
	force?: boolean
	/** Leave existing resources alone and report them as skipped. */
	skipExisting?: boolean
	/** Decide everything, write nothing. */
	dryRun?: boolean
}

export interface ImportOptions extends ImportPolicy {
	provenance?: Provenance
	mode: ImportMode
	now?: Date
}

/**
 * A path to classify (file, skill directory, or directory to search) or a
 * resource that was already loaded by discovery.
 */
export type ImportCandidate = AbsolutePath | Resource

export interface ImportedResource {
	ref: ResourceRef
	path: AbsolutePath
	replaced: boolean
}

export interface FailedImport {
	path: string
	message: string
	error: AppError
}

export interface ImportReport {
	added: ImportedResource[]
	skipped: ResourceRef[]
	failed: FailedImport[]
	counts: Record<ResourceType, number>
	warnings: string[]
	dryRun: boolean
}

export type ImportError = (IoError | ConflictError) & { report: ImportReport }

/**
 * Import candidates into the repository under a conflict policy.
 *
 * | exists | force | skipExisting | neither |
 * |---|---|---|---|
 * | no | import | import | import |
 * | yes | overwrite, reported added | skipped | failed |
 *
 * Every candidate is processed before a conflict fails the batch. An IO error
 * stops the batch at once; the partial report travels with the error. A dry
 * run reports exactly what a real run would and touches nothing.
 */
export async function importResources(
	handle: RepoHandle,
	candidates: ImportCandidate[],
	options: ImportOptions,
): Promise<Result<ImportReport, ImportError>> {
	const report = createReport(Boolean(options.dryRun))
	const now = options.now ?? new Date()
	const conflicts: ResourceRef[] = []
	// Refs written earlier in this batch, so a dry run sees what a real run would.
	const planned = new Set<string>()
	// Metadata files claimed in this batch, by the name that claimed them.
	const claimed = new Map<string, ResourceName>()

	const queue = [...candidates]
	while (queue.length > 0) {
		const candidate = queue.shift()
		if (candidate === undefined) {
			break
		}
		const resolved = await resolveCandidate(candidate)
		if (!resolved.ok) {
			if (resolved.error.type === "io") {
				return abort(resolved.error, report)
			}
			report.failed.push(failure(candidatePath(candidate), resolved.error))
			continue
		}

		if (resolved.value.kind === "expanded") {
			queue.unshift(...resolved.value.resources)
			report.failed.push(...resolved.value.failed)
			continue
		}

		const resource = resolved.value.resource
		const ref: ResourceRef = { name: resource.name, type: resource.type }
		const onDisk = await resourceExists(handle, ref)
		if (!onDisk.ok) {
			return abort(onDisk.error, report)
		}
		const exists = onDisk.value || planned.has(formatResourceRef(ref))

		const clash = await metadataClash(handle, ref, claimed)
		if (!clash.ok) {
			return abort(clash.error, report)
		}
		if (clash.value) {
			report.failed.push(failure(resource.path, clash.value))
			continue
		}

		if (exists && !options.force) {
			if (options.skipExisting) {
				report.skipped.push(ref)
				continue
			}
			const conflict: ConflictError = {
				message: `resource '${formatResourceRef(ref)}' already exists in repository`,
				path: resourcePath(handle, ref.type, ref.name),
				target: formatResourceRef(ref),
				type: "conflict",
			}
			conflicts.push(ref)
			report.failed.push(failure(resource.path, conflict))
			continue
		}

		if (!options.dryRun) {
			const written = await writeResource(handle, resource, onDisk.value, options, now)
			if (!written.ok) {
				return abort(written.error, report)
			}
		}

		report.added.push({
			path: resourcePath(handle, ref.type, ref.name),
			ref,
			replaced: exists,
		})
		report.counts[ref.type] += 1
		planned.add(formatResourceRef(ref))
		claimed.set(metadataPath(handle, ref.type, ref.name), ref.name)
	}

	if (!options.dryRun && report.added.length > 0) {
		await commitBestEffort(handle, importCommitMessage(report), report.warnings)
	}

	if (conflicts.length > 0) {
		const names = conflicts.map(formatResourceRef)
		return {
			error: {
				message: `${conflicts.length} resource(s) already exist in repository (${names.join(", ")}). Use force or skip-existing.`,
				report,
				target: names.join(", "),
				type: "conflict",
			},
			ok: false,
		}
	}

	return { ok: true, value: report }
}

/**
 * "import 3 resource(s) (2 command(s), 1 skill(s))"
 */
export function importCommitMessage(report: ImportReport): string {
	const parts = RESOURCE_TYPES.filter((type) => report.counts[type] > 0).map(
		(type) => `${report.counts[type]} ${type}(s)`,
	)
	return `import ${report.added.length} resource(s) (${parts.join(", ")})`
}

/**
 * "3 added, 1 skipped, 0 failed"
 */
export function formatImportSummary(report: ImportReport): string {
	return `${report.added.length} added, ${report.skipped.length} skipped, ${report.failed.length} failed`
}

export function createReport(dryRun: boolean): ImportReport {
	return {
		added: [],
		counts: { agent: 0, command: 0, package: 0, skill: 0 },
		dryRun,
		failed: [],
		skipped: [],
		warnings: [],
	}
}

type Resolved =
	| { kind: "resource"; resource: Resource }
	| { kind: "expanded"; resources: Resource[]; failed: FailedImport[] }

async function resolveCandidate(candidate: ImportCandidate): Promise<Result<Resolved>> {
	if (typeof candidate !== "string") {
		return { ok: true, value: { kind: "resource", resource: candidate } }
	}

	const stats = await safeStat(candidate)
	if (!stats.ok) {
		return stats
	}

	if (stats.value?.isDirectory() && !(await isSkillDir(candidate))) {
		const discovered = await discoverAll(candidate)
		if (!discovered.ok) {
			return discovered
		}
		return {
			ok: true,
			value: {
				failed: discovered.value.issues.map(issueFailure),
				kind: "expanded",
				resources: discoveredResources(discovered.value),
			},
		}
	}

	const type = await detectType(candidate)
	if (!type.ok) {
		return type
	}

	const loaded = await getKind(type.value).load(candidate)
	if (!loaded.ok) {
		return loaded
	}
	return { ok: true, value: { kind: "resource", resource: loaded.value } }
}

async function writeResource(
	handle: RepoHandle,
	resource: Resource,
	replace: boolean,
	options: ImportOptions,
	now: Date,
): Promise<Result<void, IoError>> {
	if (replace) {
		const removed = await removePath(resourcePath(handle, resource.type, resource.name))
		if (!removed.ok) {
			return removed
		}
	}

	const stored = await storeResource(handle, resource, options.mode)
	if (!stored.ok) {
		return stored
	}

	const existing = await loadMetadata(handle, resource.type, resource.name)
	if (!existing.ok && existing.error.type === "io") {
		return { error: existing.error, ok: false }
	}

	const provenance = options.provenance ?? {
		sourceType: "file",
		sourceUrl: `file://${resource.path}`,
	}
	const metadata = buildMetadata(
		existing.ok ? existing.value : null,
		{ name: resource.name, type: resource.type },
		provenance,
		now,
	)
	return saveMetadata(handle, metadata)
}

/**
 * Nested names flatten into metadata file names, so "api/deploy" and
 * "api-deploy" cannot both be stored. The name already holding the file wins.
 */
async function metadataClash(
	handle: RepoHandle,
	ref: ResourceRef,
	claimed: Map<string, ResourceName>,
): Promise<Result<ConflictError | null, IoError>> {
	const key = metadataPath(handle, ref.type, ref.name)
	let owner = claimed.get(key) ?? null
	if (owner === null) {
		const stored = await metadataOwner(handle, ref.type, ref.name)
		if (!stored.ok) {
			return stored
		}
		owner = stored.value
	}
	if (owner === null || owner === ref.name) {
		return { ok: true, value: null }
	}

	const other = formatResourceRef({ name: owner, type: ref.type })
	return {
		ok: true,
		value: {
			message: `resource '${formatResourceRef(ref)}' would share its metadata file with '${other}'`,
			path: key,
			target: formatResourceRef(ref),
			type: "conflict",
		},
	}
}

function candidatePath(candidate: ImportCandidate): string {
	return typeof candidate === "string" ? candidate : candidate.path
}

function failure(path: string, error: AppError): FailedImport {
	return { error, message: error.message, path }
}

function issueFailure(issue: DiscoveryIssue): FailedImport {
	return failure(issue.path, {
		field: "path",
		message: issue.message,
		path: issue.path,
		source: "manual",
		type: "validation",
	})
}

function abort(
	error: IoError,
	report: ImportReport,
): { ok: false; error: ImportError } {
	return { error: { ...error, report }, ok: false }
}
