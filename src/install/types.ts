import type { ResourceRef } from "@/resources/types"
import type { InstallableType, ToolId } from "@/tools/types"
import type { AbsolutePath } from "@/types/branded"
import type { AppError } from "@/types/error"

/**
 * - created: a new link was made
 * - replaced: a dangling link was swapped for a live one
 * - unchanged: a live link was already there
 * - occupied: a real file or directory holds the name; left alone
 */
export type LinkStatus = "created" | "replaced" | "unchanged" | "occupied"

export interface LinkResult {
	tool: ToolId
	linkPath: AbsolutePath
	status: LinkStatus
}

export interface InstalledResource {
	ref: ResourceRef
	links: LinkResult[]
}

export interface InstallFailure {
	ref: ResourceRef
	message: string
	error: AppError
}

export interface InstallReport {
	installed: InstalledResource[]
	failed: InstallFailure[]
	warnings: string[]
}

export interface UninstallReport {
	ref: ResourceRef
	removedFrom: ToolId[]
	warnings: string[]
}

export type LinkHealth = "ok" | "broken"

/**
 * One installed resource, merged across every tool that links it.
 */
export interface InstalledEntry {
	type: InstallableType
	name: string
	description?: string
	/** Link target; for a broken link, the path that no longer exists. */
	path: AbsolutePath
	health: LinkHealth
	tools: ToolId[]
}

export interface InstalledListing {
	entries: InstalledEntry[]
	warnings: string[]
}

/**
 * A link removed, or on a dry run to be removed, by a clean.
 */
export interface CleanedLink {
	tool: ToolId
	type: InstallableType
	name: string
	linkPath: AbsolutePath
}
