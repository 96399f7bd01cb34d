import { readLinkTarget, safeLstat, safeStat } from "@/io/fs"
import { commitBestEffort } from "@/repo/git"
import { metadataPath, type RepoHandle, resourcePath } from "@/repo/handle"
import {
	buildMetadata,
	deleteMetadata,
	listMetadata,
	type MetadataError,
	type Provenance,
	saveMetadata,
} from "@/repo/metadata"
import { listResources, orphanedFileWarning, orphanedMetadataWarning } from "@/repo/store"
import { formatResourceRef } from "@/resources/ref"
import type { ResourceRef } from "@/resources/types"
import type { AbsolutePath, ResourceType } from "@/types/branded"
import type { IoError, Result } from "@/types/error"

const FILE_URL_PREFIX = "file://"

/**
 * Recorded for resources whose only copy lives in the repository, so there
 * is nothing to update them from.
 */
export const REPOSITORY_SOURCE_TYPE = "repository"

export interface OrphanedRecord {
	ref: ResourceRef
	metadataPath: AbsolutePath
}

export interface MissingSourcePath {
	ref: ResourceRef
	sourcePath: string
}

export interface IncompletePackage {
	ref: ResourceRef
	missing: string[]
}

export interface VerifyReport {
	/** Resource files without a metadata record. */
	missingMetadata: ResourceRef[]
	/** Metadata records whose resource file is gone. */
	orphanedMetadata: OrphanedRecord[]
	/** Local source paths, recorded at import, that no longer exist. */
	missingSourcePaths: MissingSourcePath[]
	/** Packages naming members the repository does not hold. */
	incompletePackages: IncompletePackage[]
	warnings: string[]
}

/**
 * Check that every resource file has metadata and every record has a file,
 * that recorded local sources still exist, and that packages are complete.
 */
export async function verifyRepository(
	handle: RepoHandle,
	type?: ResourceType,
): Promise<Result<VerifyReport, MetadataError>> {
	const report: VerifyReport = {
		incompletePackages: [],
		missingMetadata: [],
		missingSourcePaths: [],
		orphanedMetadata: [],
		warnings: [],
	}

	const listing = await listResources(handle, type)
	if (!listing.ok) {
		return listing
	}
	const reported = new Set<string>()

	for (const { metadata, resource } of listing.value.resources) {
		const ref: ResourceRef = { name: resource.name, type: resource.type }
		if (!metadata) {
			report.missingMetadata.push(ref)
			reported.add(orphanedFileWarning(ref))
		} else if (metadata.source_url.startsWith(FILE_URL_PREFIX)) {
			const sourcePath = metadata.source_url.slice(FILE_URL_PREFIX.length)
			const stats = await safeStat(sourcePath)
			if (!stats.ok) {
				return stats
			}
			if (!stats.value) {
				report.missingSourcePaths.push({ ref, sourcePath })
			}
		}

		if (resource.type !== "package") {
			continue
		}
		const missing: string[] = []
		for (const member of resource.resources) {
			const present = await safeLstat(resourcePath(handle, member.type, member.name))
			if (!present.ok) {
				return present
			}
			if (!present.value) {
				missing.push(formatResourceRef(member))
			}
		}
		if (missing.length > 0) {
			report.incompletePackages.push({ missing, ref })
		}
	}

	const scan = await listMetadata(handle, type)
	if (!scan.ok) {
		return scan
	}
	for (const record of scan.value.records) {
		const ref: ResourceRef = { name: record.name, type: record.type }
		const present = await safeLstat(resourcePath(handle, ref.type, ref.name))
		if (!present.ok) {
			return present
		}
		if (!present.value) {
			report.orphanedMetadata.push({
				metadataPath: metadataPath(handle, ref.type, ref.name),
				ref,
			})
			reported.add(orphanedMetadataWarning(ref))
		}
	}

	report.warnings = listing.value.warnings.filter((warning) => !reported.has(warning))
	return { ok: true, value: report }
}

/**
 * Orphaned metadata and incomplete packages are errors; the rest are
 * warnings.
 */
export function hasVerifyErrors(report: VerifyReport): boolean {
	return report.orphanedMetadata.length > 0 || report.incompletePackages.length > 0
}

export interface RepairOptions {
	dryRun?: boolean
}

export interface RepairReport {
	created: ResourceRef[]
	removed: OrphanedRecord[]
	/** Left for the user: packages with missing members. */
	unfixable: IncompletePackage[]
	dryRun: boolean
	warnings: string[]
}

/**
 * Fix what verification finds where it can: write metadata for resource
 * files without it and delete metadata whose file is gone. A resource
 * stored as a link records the link target as its source.
 */
export async function repairRepository(
	handle: RepoHandle,
	options: RepairOptions = {},
): Promise<Result<RepairReport, MetadataError>> {
	const verified = await verifyRepository(handle)
	if (!verified.ok) {
		return verified
	}

	const dryRun = Boolean(options.dryRun)
	const report: RepairReport = {
		created: [],
		dryRun,
		removed: [],
		unfixable: verified.value.incompletePackages,
		warnings: verified.value.warnings,
	}

	for (const ref of verified.value.missingMetadata) {
		if (!dryRun) {
			const written = await recordMetadata(handle, ref)
			if (!written.ok) {
				return written
			}
		}
		report.created.push(ref)
	}

	for (const orphan of verified.value.orphanedMetadata) {
		if (!dryRun) {
			const deleted = await deleteMetadata(handle, orphan.ref.type, orphan.ref.name)
			if (!deleted.ok) {
				return deleted
			}
		}
		report.removed.push(orphan)
	}

	const fixed = report.created.length + report.removed.length
	if (!dryRun && fixed > 0) {
		await commitBestEffort(handle, `repair: fix ${fixed} metadata issue(s)`, report.warnings)
	}
	return { ok: true, value: report }
}

/**
 * "2 fixed, 1 unfixable", or on a dry run "2 planned, 1 unfixable"
 */
export function formatRepairSummary(report: RepairReport): string {
	const fixed = report.created.length + report.removed.length
	const verb = report.dryRun ? "planned" : "fixed"
	return `${fixed} ${verb}, ${report.unfixable.length} unfixable`
}

async function recordMetadata(handle: RepoHandle, ref: ResourceRef): Promise<Result<void, IoError>> {
	const stored = resourcePath(handle, ref.type, ref.name)
	const stats = await safeLstat(stored)
	if (!stats.ok) {
		return stats
	}

	let provenance: Provenance = {
		sourceType: REPOSITORY_SOURCE_TYPE,
		sourceUrl: `${FILE_URL_PREFIX}${stored}`,
	}
	if (stats.value?.isSymbolicLink()) {
		const target = await readLinkTarget(stored)
		if (!target.ok) {
			return target
		}
		provenance = { sourceType: "file", sourceUrl: `${FILE_URL_PREFIX}${target.value}` }
	}

	const installed = stats.value?.mtime ?? new Date()
	return saveMetadata(handle, buildMetadata(null, ref, provenance, installed))
}
