import type { ResourceType } from "@/resources/types"
import type { AbsolutePath } from "@/types/branded"

export type ToolId = "claude" | "opencode" | "copilot"

/**
 * Resource types a tool can link. Packages install as their members.
 */
export type InstallableType = Exclude<ResourceType, "package">

export interface ToolDefinition {
	id: ToolId
	displayName: string
	aliases: string[]
	/** Directory whose presence in a project marks the tool as in use. */
	detectDir: string
	dirs: Partial<Record<InstallableType, string>>
}

/**
 * A tool bound to one project: absolute directories per supported type.
 */
export interface ResolvedTool {
	id: ToolId
	displayName: string
	dirs: Partial<Record<InstallableType, AbsolutePath>>
}
