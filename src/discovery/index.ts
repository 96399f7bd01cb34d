import path from "node:path"
import { discoverAgents, discoverCommands } from "@/discovery/markdown"
import { discoverPackages } from "@/discovery/packages"
import { discoverSkills } from "@/discovery/skills"
import type { DiscoveredResources, Discovery, DiscoveryIssue } from "@/discovery/types"
import { safeStat } from "@/io/fs"
import type { IoResult } from "@/io/fs"
import type { Resource, ResourceType } from "@/resources/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { IoError, NotFoundError, Result, ValidationError } from "@/types/error"

export { discoverAgents, discoverCommands } from "@/discovery/markdown"
export { discoverPackages } from "@/discovery/packages"
export { discoverSkills } from "@/discovery/skills"
export type { DiscoveredResources, Discovery, DiscoveryIssue } from "@/discovery/types"

export type DiscoveryError = NotFoundError | ValidationError | IoError

/**
 * Resolve an optional subpath below a source root. The result must stay
 * inside the root and be an existing directory.
 */
export async function resolveSearchRoot(
	root: AbsolutePath,
	subpath?: string,
): Promise<Result<AbsolutePath, DiscoveryError>> {
	const trimmed = subpath?.trim()
	const searchRoot = trimmed ? joinAbsolute(root, ...trimmed.split("/")) : root

	const relative = path.relative(root, searchRoot)
	if (relative.startsWith("..") || path.isAbsolute(relative)) {
		return {
			error: {
				field: "subpath",
				message: `Subpath '${trimmed ?? ""}' points outside ${root}.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const stats = await safeStat(searchRoot)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return {
			error: {
				message: `Search path does not exist: ${searchRoot}`,
				path: searchRoot,
				target: "directory",
				type: "not_found",
			},
			ok: false,
		}
	}
	if (!stats.value.isDirectory()) {
		return {
			error: {
				field: "path",
				message: `Search path is not a directory: ${searchRoot}`,
				path: searchRoot,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return { ok: true, value: searchRoot }
}

/**
 * Run every discoverer over a source directory. Only an unusable search
 * root is an error; anything that goes wrong below it becomes an issue.
 */
export async function discoverAll(
	root: AbsolutePath,
	subpath?: string,
): Promise<Result<DiscoveredResources, DiscoveryError>> {
	const searchRoot = await resolveSearchRoot(root, subpath)
	if (!searchRoot.ok) {
		return searchRoot
	}

	const issues: DiscoveryIssue[] = []
	const commands = collect(await discoverCommands(searchRoot.value), issues)
	const skills = collect(await discoverSkills(searchRoot.value), issues)
	const agents = collect(await discoverAgents(searchRoot.value), issues)
	const packages = collect(await discoverPackages(searchRoot.value), issues)

	return { ok: true, value: { agents, commands, issues, packages, skills } }
}

function collect<T extends ResourceType>(
	result: IoResult<Discovery<T>>,
	issues: DiscoveryIssue[],
): Discovery<T>["resources"] {
	if (!result.ok) {
		issues.push({ message: result.error.message, path: result.error.path })
		return []
	}
	issues.push(...result.value.issues)
	return result.value.resources
}

/**
 * Everything discovered, in import order: commands, skills, agents, packages.
 */
export function discoveredResources(discovered: DiscoveredResources): Resource[] {
	return [
		...discovered.commands,
		...discovered.skills,
		...discovered.agents,
		...discovered.packages,
	]
}

/**
 * "2 commands, 1 skills, 0 agents, 0 packages"
 */
export function formatDiscoveryCounts(discovered: DiscoveredResources): string {
	return [
		`${discovered.commands.length} commands`,
		`${discovered.skills.length} skills`,
		`${discovered.agents.length} agents`,
		`${discovered.packages.length} packages`,
	].join(", ")
}
