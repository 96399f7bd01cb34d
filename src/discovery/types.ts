import type { ResourceOf, ResourceType } from "@/resources/types"
import type { AbsolutePath } from "@/types/branded"

/**
 * A file or directory that looked like a resource but failed to load.
 */
export interface DiscoveryIssue {
	path: AbsolutePath
	message: string
}

export interface Discovery<T extends ResourceType> {
	resources: ResourceOf<T>[]
	issues: DiscoveryIssue[]
}

export interface DiscoveredResources {
	commands: ResourceOf<"command">[]
	skills: ResourceOf<"skill">[]
	agents: ResourceOf<"agent">[]
	packages: ResourceOf<"package">[]
	issues: DiscoveryIssue[]
}

export function dedupeByName<T extends { name: string }>(items: T[]): T[] {
	const seen = new Set<string>()
	return items.filter((item) => {
		if (seen.has(item.name)) {
			return false
		}
		seen.add(item.name)
		return true
	})
}
