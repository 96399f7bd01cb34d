import { dedupeByName, type Discovery, type DiscoveryIssue } from "@/discovery/types"
import { readDirEntries } from "@/io/fs"
import type { IoResult } from "@/io/fs"
import { loadPackage, PACKAGE_EXTENSION } from "@/resources/package"
import type { PackageResource } from "@/resources/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

/**
 * Packages live only in `packages/*.package.json` directly below the root.
 */
export async function discoverPackages(
	root: AbsolutePath,
): Promise<IoResult<Discovery<"package">>> {
	const dir = joinAbsolute(root, "packages")
	const entries = await readDirEntries(dir)
	if (!entries.ok) {
		return entries
	}

	const resources: PackageResource[] = []
	const issues: DiscoveryIssue[] = []
	for (const entry of entries.value) {
		if (!entry.isFile() || !entry.name.endsWith(PACKAGE_EXTENSION)) {
			continue
		}

		const filePath = joinAbsolute(dir, entry.name)
		const loaded = await loadPackage(filePath)
		if (loaded.ok) {
			resources.push(loaded.value)
		} else {
			issues.push({ message: loaded.error.message, path: filePath })
		}
	}

	return { ok: true, value: { issues, resources: dedupeByName(resources) } }
}
