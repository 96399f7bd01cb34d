/**
 * Repository test helpers
 *
 * A repository handle under a temp dir, and a source resolver that maps
 * source names to local directories so sync runs without git.
 */

import { join } from "node:path"
import { createRepoHandle, type RepoHandle } from "@/repo/handle"
import type { SourceResolver } from "@/sources/resolve"
import { abs } from "./branded"

export function testRepo(dir: string): RepoHandle {
	return createRepoHandle(abs(join(dir, "repo")))
}

/**
 * Resolves sources by name. Names mapped to null, or not mapped at all,
 * are unavailable.
 */
export function stubResolver(dirs: Record<string, string | null>): SourceResolver {
	return {
		async resolve(source) {
			const dir = dirs[source.name]
			if (!dir) {
				return {
					error: {
						location: source.url ?? source.path ?? "",
						message: `Source '${source.name}' is unavailable`,
						source: source.name,
						type: "source_unavailable",
					},
					ok: false,
				}
			}
			return { ok: true, value: abs(dir) }
		},
	}
}
