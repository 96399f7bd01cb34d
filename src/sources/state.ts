import { z } from "zod"
import { readOptionalTextFile, writeTextFile } from "@/io/fs"
import type { IoResult } from "@/io/fs"
import type { RepoHandle } from "@/repo/handle"
import type { IoError, ParseError, Result, ValidationError } from "@/types/error"

export const SOURCE_STATE_VERSION = 1

const SourceStateEntrySchema = z.object({
	added: z.string(),
	last_synced: z.string().optional(),
	source_id: z.string().optional(),
})

const SourceStateSchema = z.object({
	sources: z.record(SourceStateEntrySchema).default({}),
	version: z.number().int(),
})

export type SourceStateEntry = z.infer<typeof SourceStateEntrySchema>

/**
 * Per-source timestamps kept in .metadata/sources.json, keyed by source name.
 */
export interface SourceState {
	version: number
	sources: Record<string, SourceStateEntry>
}

export type SourceStateError = IoError | ParseError | ValidationError

export function createEmptyState(): SourceState {
	return { sources: {}, version: SOURCE_STATE_VERSION }
}

export async function loadSourceState(
	handle: RepoHandle,
): Promise<Result<SourceState, SourceStateError>> {
	const contents = await readOptionalTextFile(handle.sourceStatePath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: createEmptyState() }
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(contents.value)
	} catch (error) {
		return {
			error: {
				message: `Invalid JSON in ${handle.sourceStatePath}.`,
				path: handle.sourceStatePath,
				rawError: error instanceof Error ? error : undefined,
				source: "source_state",
				type: "parse",
			},
			ok: false,
		}
	}

	const result = SourceStateSchema.safeParse(parsed)
	if (!result.success) {
		return {
			error: {
				field: "sources",
				message: `Invalid source state in ${handle.sourceStatePath}.`,
				path: handle.sourceStatePath,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	if (result.data.version !== SOURCE_STATE_VERSION) {
		return {
			error: {
				field: "version",
				message: `Unsupported source state version ${result.data.version}.`,
				path: handle.sourceStatePath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return { ok: true, value: result.data }
}

export async function saveSourceState(
	handle: RepoHandle,
	state: SourceState,
): Promise<IoResult<void>> {
	return writeTextFile(handle.sourceStatePath, `${JSON.stringify(state, null, 2)}\n`)
}

export function getStateEntry(state: SourceState, name: string): SourceStateEntry | undefined {
	return state.sources[name]
}

/**
 * Record a newly added source. An existing entry keeps its last sync time.
 */
export function setAdded(
	state: SourceState,
	name: string,
	sourceId: string | undefined,
	now: Date,
): SourceState {
	const existing = state.sources[name]
	return {
		...state,
		sources: {
			...state.sources,
			[name]: {
				added: now.toISOString(),
				last_synced: existing?.last_synced,
				source_id: sourceId,
			},
		},
	}
}

export function setLastSynced(state: SourceState, name: string, now: Date): SourceState {
	const timestamp = now.toISOString()
	const existing = state.sources[name]
	return {
		...state,
		sources: {
			...state.sources,
			[name]: {
				added: existing?.added ?? timestamp,
				last_synced: timestamp,
				source_id: existing?.source_id,
			},
		},
	}
}

export function deleteStateEntry(state: SourceState, name: string): SourceState {
	if (!(name in state.sources)) {
		return state
	}
	const sources = Object.fromEntries(
		Object.entries(state.sources).filter(([key]) => key !== name),
	)
	return { ...state, sources }
}
