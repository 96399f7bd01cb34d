import { z } from "zod"
import {
	readDirEntries,
	readOptionalTextFile,
	removePath,
	safeLstat,
	writeTextFile,
} from "@/io/fs"
import type { IoResult } from "@/io/fs"
import { type RepoHandle, metadataPath, metadataTypeDir } from "@/repo/handle"
import type { ResourceRef } from "@/resources/types"
import {
	type AbsolutePath,
	RESOURCE_TYPES,
	type ResourceName,
	type ResourceType,
} from "@/types/branded"
import { coerceResourceName, joinAbsolute } from "@/types/coerce"
import type { IoError, ParseError, Result, ValidationError } from "@/types/error"

const METADATA_SUFFIX = "-metadata.json"

const MetadataSchema = z.object({
	first_installed: z.string().min(1),
	last_updated: z.string().min(1),
	name: z.string().transform((value, ctx) => {
		const name = coerceResourceName(value, true)
		if (!name) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid resource name '${value}'.` })
			return z.NEVER
		}
		return name
	}),
	ref: z.string().optional(),
	source_id: z.string().optional(),
	source_name: z.string().optional(),
	source_type: z.string(),
	source_url: z.string(),
	type: z.enum(RESOURCE_TYPES),
})

/**
 * Provenance record stored beside each resource.
 */
export type ResourceMetadata = z.infer<typeof MetadataSchema>

export type MetadataError = IoError | ParseError | ValidationError

/**
 * Where a resource came from, as recorded at import time.
 */
export interface Provenance {
	sourceType: string
	sourceUrl: string
	sourceName?: string
	sourceId?: string
	ref?: string
}

/**
 * The record for one resource. Nested names share a flattened file name
 * ("api/deploy" and "api-deploy"), so a record written for another name
 * counts as missing.
 */
export async function loadMetadata(
	handle: RepoHandle,
	type: ResourceType,
	name: string,
): Promise<Result<ResourceMetadata | null, MetadataError>> {
	const record = await readMetadataFile(metadataPath(handle, type, name))
	if (!record.ok || !record.value || record.value.name === name) {
		return record
	}
	return { ok: true, value: null }
}

/**
 * Name of the other resource whose record occupies this resource's metadata
 * file, or null when the file is free, unreadable or already this resource's.
 */
export async function metadataOwner(
	handle: RepoHandle,
	type: ResourceType,
	name: string,
): Promise<IoResult<ResourceName | null>> {
	const record = await readMetadataFile(metadataPath(handle, type, name))
	if (!record.ok) {
		if (record.error.type === "io") {
			return { error: record.error, ok: false }
		}
		return { ok: true, value: null }
	}
	if (!record.value || record.value.name === name) {
		return { ok: true, value: null }
	}
	return { ok: true, value: record.value.name }
}

export async function saveMetadata(
	handle: RepoHandle,
	metadata: ResourceMetadata,
): Promise<IoResult<void>> {
	const target = metadataPath(handle, metadata.type, metadata.name)
	return writeTextFile(target, `${JSON.stringify(metadata, null, 2)}\n`)
}

/**
 * Delete a metadata record. Resolves to false when there was none, or when
 * the file holds another resource's record.
 */
export async function deleteMetadata(
	handle: RepoHandle,
	type: ResourceType,
	name: string,
): Promise<IoResult<boolean>> {
	const target = metadataPath(handle, type, name)
	const stats = await safeLstat(target)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: false }
	}

	const owner = await metadataOwner(handle, type, name)
	if (!owner.ok) {
		return owner
	}
	if (owner.value !== null) {
		return { ok: true, value: false }
	}

	const removed = await removePath(target)
	if (!removed.ok) {
		return removed
	}
	return { ok: true, value: true }
}

export interface MetadataScan {
	records: ResourceMetadata[]
	warnings: string[]
}

/**
 * Read every metadata record, optionally for one type. Unreadable records
 * become warnings so one bad file never hides the rest.
 */
export async function listMetadata(
	handle: RepoHandle,
	type?: ResourceType,
): Promise<IoResult<MetadataScan>> {
	const types = type ? [type] : RESOURCE_TYPES
	const records: ResourceMetadata[] = []
	const warnings: string[] = []

	for (const current of types) {
		const dir = metadataTypeDir(handle, current)
		const entries = await readDirEntries(dir)
		if (!entries.ok) {
			return entries
		}

		for (const entry of entries.value) {
			if (!entry.isFile() || !entry.name.endsWith(METADATA_SUFFIX)) {
				continue
			}

			const record = await readMetadataFile(joinAbsolute(dir, entry.name))
			if (!record.ok) {
				if (record.error.type === "io") {
					return { error: record.error, ok: false }
				}
				warnings.push(record.error.message)
				continue
			}
			if (record.value && record.value.type === current) {
				records.push(record.value)
			}
		}
	}

	return { ok: true, value: { records, warnings } }
}

/**
 * Whether a record belongs to a source. The stable id decides when both
 * sides have one; the name is the fallback for records written without ids.
 */
export function attributedToSource(
	metadata: ResourceMetadata,
	source: { id?: string; name: string },
): boolean {
	if (metadata.source_id && source.id) {
		return metadata.source_id === source.id
	}
	return metadata.source_name === source.name
}

export function buildMetadata(
	existing: ResourceMetadata | null,
	ref: ResourceRef,
	provenance: Provenance,
	now: Date,
): ResourceMetadata {
	const timestamp = now.toISOString()
	return {
		first_installed: existing?.first_installed ?? timestamp,
		last_updated: timestamp,
		name: ref.name,
		ref: provenance.ref,
		source_id: provenance.sourceId,
		source_name: provenance.sourceName,
		source_type: provenance.sourceType,
		source_url: provenance.sourceUrl,
		type: ref.type,
	}
}

async function readMetadataFile(
	filePath: AbsolutePath,
): Promise<Result<ResourceMetadata | null, MetadataError>> {
	const contents = await readOptionalTextFile(filePath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: null }
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(contents.value)
	} catch (error) {
		return {
			error: {
				message: `Invalid JSON in ${filePath}.`,
				path: filePath,
				rawError: error instanceof Error ? error : undefined,
				source: "metadata",
				type: "parse",
			},
			ok: false,
		}
	}

	const result = MetadataSchema.safeParse(parsed)
	if (!result.success) {
		return {
			error: {
				field: "metadata",
				message: `Invalid metadata in ${filePath}.`,
				path: filePath,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: result.data }
}
