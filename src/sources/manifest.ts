import path from "node:path"
import { parse, stringify } from "yaml"
import { z } from "zod"
import { readOptionalTextFile, writeTextFile } from "@/io/fs"
import type { RepoHandle } from "@/repo/handle"
import {
	computeSourceId,
	generateSourceName,
	normalizeGitUrl,
	type SourceLocation,
} from "@/sources/id"
import type { ImportMode, SourceId, SourceName } from "@/types/branded"
import { coerceSourceId, coerceSourceName, nameSegmentProblem } from "@/types/coerce"
import type {
	ConflictError,
	IoError,
	NotFoundError,
	ParseError,
	Result,
	ValidationError,
} from "@/types/error"

export const MANIFEST_VERSION = 1

export interface Source {
	id: SourceId
	name: SourceName
	path?: string
	url?: string
	ref?: string
	subpath?: string
	mode: ImportMode
	added?: string
	last_synced?: string
}

export interface SourceManifest {
	version: number
	sources: Source[]
}

export interface SourceInput {
	name?: string
	path?: string
	url?: string
	ref?: string
	subpath?: string
}

export type ManifestLoadError = IoError | ParseError | ValidationError

const RawSourceSchema = z.object({
	added: z.string().optional(),
	id: z.string().optional(),
	last_synced: z.string().optional(),
	mode: z.enum(["symlink", "copy"]).optional(),
	name: z.string(),
	path: z.string().optional(),
	ref: z.string().optional(),
	subpath: z.string().optional(),
	url: z.string().optional(),
})

const RawManifestSchema = z.object({
	sources: z.array(RawSourceSchema).nullish(),
	version: z.number().int(),
})

export function createEmptyManifest(): SourceManifest {
	return { sources: [], version: MANIFEST_VERSION }
}

/**
 * Load ai.repo.yaml. A missing file is an empty manifest. Sources written
 * before ids existed get one derived from their location.
 */
export async function loadSourceManifest(
	handle: RepoHandle,
): Promise<Result<SourceManifest, ManifestLoadError>> {
	const contents = await readOptionalTextFile(handle.manifestPath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: createEmptyManifest() }
	}

	return parseSourceManifest(contents.value, handle)
}

export function parseSourceManifest(
	contents: string,
	handle: RepoHandle,
): Result<SourceManifest, ParseError | ValidationError> {
	let raw: unknown
	try {
		raw = parse(contents)
	} catch (error) {
		return {
			error: {
				message: `Invalid YAML in ${handle.manifestPath}.`,
				path: handle.manifestPath,
				rawError: error instanceof Error ? error : undefined,
				source: "source_manifest",
				type: "parse",
			},
			ok: false,
		}
	}

	if (raw === null || raw === undefined) {
		return { ok: true, value: createEmptyManifest() }
	}

	const result = RawManifestSchema.safeParse(raw)
	if (!result.success) {
		return {
			error: {
				field: "sources",
				message: `Invalid source manifest ${handle.manifestPath}.`,
				path: handle.manifestPath,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	const sources: Source[] = []
	for (const entry of result.data.sources ?? []) {
		const location = locationOf(entry)
		const id = entry.id ? coerceSourceId(entry.id) : location && computeSourceId(location)
		if (!id) {
			return manifestInvalid(
				"id",
				`Source '${entry.name}' has an invalid id '${entry.id ?? ""}'.`,
			)
		}

		const name = coerceSourceName(entry.name)
		if (!name) {
			const problem = nameSegmentProblem(entry.name) ?? "invalid"
			return manifestInvalid("name", `Invalid source name '${entry.name}': ${problem}.`)
		}

		const mode: ImportMode = entry.mode ?? (entry.url ? "copy" : "symlink")
		sources.push({
			added: entry.added,
			id,
			last_synced: entry.last_synced,
			mode,
			name,
			path: entry.path,
			ref: entry.ref,
			subpath: entry.subpath,
			url: entry.url,
		})
	}

	const manifest: SourceManifest = { sources, version: result.data.version }
	const validation = validateSourceManifest(manifest)
	if (!validation.ok) {
		return { error: { ...validation.error, path: handle.manifestPath }, ok: false }
	}

	return { ok: true, value: manifest }
}

export async function saveSourceManifest(
	handle: RepoHandle,
	manifest: SourceManifest,
): Promise<Result<void, IoError | ValidationError>> {
	const validation = validateSourceManifest(manifest)
	if (!validation.ok) {
		return validation
	}
	return writeTextFile(handle.manifestPath, serializeSourceManifest(manifest))
}

export function serializeSourceManifest(manifest: SourceManifest): string {
	// Field order is the on-disk order.
	const sources = manifest.sources.map((source) => {
		const entry: Record<string, string> = { id: source.id, name: source.name }
		if (source.path !== undefined) entry.path = source.path
		if (source.url !== undefined) entry.url = source.url
		if (source.ref !== undefined) entry.ref = source.ref
		if (source.subpath !== undefined) entry.subpath = source.subpath
		entry.mode = source.mode
		if (source.added !== undefined) entry.added = source.added
		if (source.last_synced !== undefined) entry.last_synced = source.last_synced
		return entry
	})

	return stringify({ version: manifest.version, sources })
}

/**
 * Check document-level invariants: supported version, valid and unique names,
 * unique ids, and exactly one of path or url per source.
 */
export function validateSourceManifest(
	manifest: SourceManifest,
): Result<void, ValidationError> {
	if (manifest.version !== MANIFEST_VERSION) {
		return manifestInvalid(
			"version",
			`Unsupported source manifest version ${manifest.version} (expected ${MANIFEST_VERSION}).`,
		)
	}

	const names = new Set<string>()
	const ids = new Set<string>()
	for (const source of manifest.sources) {
		const problem = nameSegmentProblem(source.name)
		if (problem) {
			return manifestInvalid("name", `Invalid source name '${source.name}': ${problem}.`)
		}

		const hasPath = Boolean(source.path)
		const hasUrl = Boolean(source.url)
		if (hasPath === hasUrl) {
			return manifestInvalid(
				"path",
				`Source '${source.name}' must have exactly one of path or url.`,
			)
		}

		if (names.has(source.name)) {
			return manifestInvalid("name", `Duplicate source name '${source.name}'.`)
		}
		if (ids.has(source.id)) {
			return manifestInvalid("id", `Duplicate source id '${source.id}'.`)
		}
		names.add(source.name)
		ids.add(source.id)
	}

	return { ok: true, value: undefined }
}

/**
 * Register a source. The id comes from the location; the name defaults to the
 * location's last segment. Duplicate locations and names are rejected.
 */
export function addSource(
	manifest: SourceManifest,
	input: SourceInput,
	now: Date,
): Result<{ manifest: SourceManifest; source: Source }, ValidationError | ConflictError> {
	const location = locationOf(input)
	if (!location || (input.path && input.url)) {
		return manifestInvalid("path", "A source needs exactly one of path or url.")
	}

	const id = computeSourceId(location)
	const requested = input.name?.trim() || generateSourceName(location)
	const name = coerceSourceName(requested)
	if (!name) {
		const problem = nameSegmentProblem(requested) ?? "invalid"
		return manifestInvalid("name", `Invalid source name '${requested}': ${problem}.`)
	}

	const sameLocation = manifest.sources.find((source) => source.id === id)
	if (sameLocation) {
		return {
			error: {
				message: `Source with same location already exists as '${sameLocation.name}'.`,
				target: sameLocation.name,
				type: "conflict",
			},
			ok: false,
		}
	}

	if (manifest.sources.some((source) => source.name === name)) {
		return {
			error: {
				message: `Source '${name}' already exists.`,
				target: name,
				type: "conflict",
			},
			ok: false,
		}
	}

	const source: Source = {
		added: now.toISOString(),
		id,
		mode: "url" in location ? "copy" : "symlink",
		name,
		path: "path" in location ? path.resolve(location.path) : undefined,
		ref: "url" in location ? input.ref : undefined,
		subpath: input.subpath,
		url: "url" in location ? location.url : undefined,
	}

	return {
		ok: true,
		value: { manifest: { ...manifest, sources: [...manifest.sources, source] }, source },
	}
}

/**
 * Remove a source by id, name, path or URL (first match wins, in that order).
 */
export function removeSource(
	manifest: SourceManifest,
	key: string,
): Result<{ manifest: SourceManifest; removed: Source }, NotFoundError> {
	const found = getSource(manifest, key)
	if (!found) {
		return sourceNotFound(key)
	}

	return {
		ok: true,
		value: {
			manifest: {
				...manifest,
				sources: manifest.sources.filter((source) => source !== found),
			},
			removed: found,
		},
	}
}

/**
 * Lookup order: id, then name, then path, then URL. A name that happens to
 * equal another source's path string matches by name.
 */
export function getSource(manifest: SourceManifest, key: string): Source | undefined {
	const trimmed = key.trim()
	if (!trimmed) {
		return undefined
	}

	const byId = manifest.sources.find((source) => source.id === trimmed)
	if (byId) return byId

	const byName = manifest.sources.find((source) => source.name === trimmed)
	if (byName) return byName

	const resolvedPath = path.resolve(trimmed)
	const byPath = manifest.sources.find(
		(source) =>
			source.path !== undefined &&
			(source.path === trimmed || path.resolve(source.path) === resolvedPath),
	)
	if (byPath) return byPath

	const normalizedUrl = normalizeGitUrl(trimmed)
	return manifest.sources.find(
		(source) =>
			source.url !== undefined &&
			(source.url === trimmed || normalizeGitUrl(source.url) === normalizedUrl),
	)
}

export function hasSource(manifest: SourceManifest, key: string): boolean {
	return getSource(manifest, key) !== undefined
}

export function sourceLocation(source: Source): SourceLocation {
	return source.url !== undefined ? { url: source.url } : { path: source.path ?? "" }
}

function locationOf(input: { path?: string; url?: string }): SourceLocation | null {
	if (input.url?.trim()) return { url: input.url.trim() }
	if (input.path?.trim()) return { path: input.path.trim() }
	return null
}

function sourceNotFound(key: string): { ok: false; error: NotFoundError } {
	return {
		error: {
			message: `Source '${key}' not found.`,
			target: "source",
			type: "not_found",
		},
		ok: false,
	}
}

function manifestInvalid(field: string, message: string): { ok: false; error: ValidationError } {
	return {
		error: { field, message, source: "manual", type: "validation" },
		ok: false,
	}
}
