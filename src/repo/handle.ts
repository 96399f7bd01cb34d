import { getKind } from "@/resources/kinds"
import type { AbsolutePath, ResourceName, ResourceType } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

export const SOURCE_MANIFEST_FILENAME = "ai.repo.yaml"
export const METADATA_DIRNAME = ".metadata"
export const SOURCE_STATE_FILENAME = "sources.json"
export const WORKSPACE_DIRNAME = ".workspace"

/**
 * Explicit handle on one repository. Built once at startup and passed to
 * every operation; nothing below the CLI looks up the repository path.
 */
export interface RepoHandle {
	root: AbsolutePath
	manifestPath: AbsolutePath
	metadataDir: AbsolutePath
	sourceStatePath: AbsolutePath
	workspaceDir: AbsolutePath
}

export function createRepoHandle(root: AbsolutePath): RepoHandle {
	const metadataDir = joinAbsolute(root, METADATA_DIRNAME)
	return {
		manifestPath: joinAbsolute(root, SOURCE_MANIFEST_FILENAME),
		metadataDir,
		root,
		sourceStatePath: joinAbsolute(metadataDir, SOURCE_STATE_FILENAME),
		workspaceDir: joinAbsolute(root, WORKSPACE_DIRNAME),
	}
}

export function typeDir(handle: RepoHandle, type: ResourceType): AbsolutePath {
	return joinAbsolute(handle.root, getKind(type).dirName)
}

export function resourcePath(
	handle: RepoHandle,
	type: ResourceType,
	name: ResourceName,
): AbsolutePath {
	return getKind(type).storagePath(typeDir(handle, type), name)
}

export function metadataTypeDir(handle: RepoHandle, type: ResourceType): AbsolutePath {
	return joinAbsolute(handle.metadataDir, getKind(type).dirName)
}

/**
 * Nested names flatten into the file name: "api/deploy" -> "api-deploy-metadata.json".
 */
export function metadataPath(
	handle: RepoHandle,
	type: ResourceType,
	name: string,
): AbsolutePath {
	const flattened = name.replaceAll("/", "-")
	return joinAbsolute(metadataTypeDir(handle, type), `${flattened}-metadata.json`)
}
