import type { ImportReport } from "@/repo/import"
import type { ResourceRef } from "@/resources/types"
import type { SourceResolver } from "@/sources/resolve"
import type { SourceId, SourceName } from "@/types/branded"
import type { AppError, SyncError } from "@/types/error"

export type SyncStage = "resolve" | "inventory" | "discover" | "import" | "rescan"

export interface SourceFailure {
	stage: SyncStage
	message: string
	error: AppError
}

export type SourceSyncResult =
	| {
			status: "synced"
			source: SourceName
			sourceId: SourceId
			import: ImportReport
			orphans: ResourceRef[]
	  }
	| {
			status: "failed"
			source: SourceName
			sourceId: SourceId
			failure: SourceFailure
	  }

/**
 * A resource attributed to a source before the sync that the source no
 * longer provides.
 */
export interface OrphanedResource {
	ref: ResourceRef
	source: SourceName
	sourceId: SourceId
}

export interface SyncSummary {
	sources: SourceSyncResult[]
	orphans: OrphanedResource[]
	removed: ResourceRef[]
	synced: number
	failed: number
	dryRun: boolean
	warnings: string[]
}

export interface SyncOptions {
	/** Keep existing resources instead of overwriting them. */
	skipExisting?: boolean
	dryRun?: boolean
	/** Delete orphans after reporting them. Defaults to true. */
	prune?: boolean
	now?: Date
	resolver?: SourceResolver
}

export type SyncFailure = SyncError & { summary: SyncSummary }
