import type {
	AbsolutePath,
	NonEmptyString,
	ResourceName,
	ResourceType,
} from "@/types/branded"
import type {
	IoError,
	NotFoundError,
	ParseError,
	Result,
	ValidationError,
} from "@/types/error"

export type { ResourceType } from "@/types/branded"

interface ResourceBase {
	name: ResourceName
	description: NonEmptyString
	path: AbsolutePath
	author?: string
	license?: string
	version?: string
}

export interface CommandResource extends ResourceBase {
	type: "command"
	agent?: string
	model?: string
	allowedTools: string[]
}

export interface SkillResource extends ResourceBase {
	type: "skill"
}

export interface AgentResource extends ResourceBase {
	type: "agent"
	model?: string
	tools: string[]
}

export interface PackageResource extends ResourceBase {
	type: "package"
	resources: MemberRef[]
}

export type Resource = CommandResource | SkillResource | AgentResource | PackageResource

export type ResourceOf<T extends ResourceType> = Extract<Resource, { type: T }>

/**
 * Identity of a resource inside the repository.
 */
export interface ResourceRef {
	type: ResourceType
	name: ResourceName
}

/**
 * A package member. Packages never nest.
 */
export interface MemberRef {
	type: Exclude<ResourceType, "package">
	name: ResourceName
}

export type ResourceLoadError = ValidationError | ParseError | IoError | NotFoundError

export type LoadResult<T extends ResourceType> = Result<ResourceOf<T>, ResourceLoadError>

export interface LoadOptions {
	/**
	 * Directory that names are derived relative to. Defaults to the nearest
	 * ancestor named after the kind's directory.
	 */
	baseDir?: AbsolutePath
}

/**
 * One implementation per resource type. Everything that differs between
 * kinds (file layout, parsing, naming) lives behind this interface.
 */
export interface ResourceKind<T extends ResourceType> {
	type: T
	dirName: string
	entry: "file" | "dir"
	allowNested: boolean
	load(sourcePath: AbsolutePath, options?: LoadOptions): Promise<LoadResult<T>>
	storagePath(typeDir: AbsolutePath, name: ResourceName): AbsolutePath
	/** Installed link name for a resource, relative to a tool directory. */
	linkName(name: ResourceName): string
}
