import { resolveSearchRoot } from "@/discovery"
import type { RepoHandle } from "@/repo/handle"
import type { Source } from "@/sources/manifest"
import type { AbsolutePath } from "@/types/branded"
import { coerceAbsolutePath } from "@/types/coerce"
import type { AppError, Result, SourceUnavailableError } from "@/types/error"
import { getOrClone } from "@/workspace/cache"

/**
 * Turns a configured source into a local directory. Sync and source
 * operations take one so tests can stand in for the git workspace.
 */
export interface SourceResolver {
	resolve(source: Source): Promise<Result<AbsolutePath, SourceUnavailableError>>
}

/**
 * Path sources resolve in place; URL sources go through the workspace cache.
 * The subpath applies to both.
 */
export function createSourceResolver(handle: RepoHandle): SourceResolver {
	return {
		async resolve(source) {
			const location = source.url ?? source.path ?? ""
			let root: AbsolutePath
			if (source.url !== undefined) {
				const cloned = await getOrClone(handle, source.url, source.ref)
				if (!cloned.ok) {
					return unavailable(source, location, cloned.error)
				}
				root = cloned.value
			} else {
				const local = coerceAbsolutePath(source.path ?? "", process.cwd())
				if (!local) {
					return unavailable(source, location)
				}
				root = local
			}

			const searchRoot = await resolveSearchRoot(root, source.subpath)
			if (!searchRoot.ok) {
				return unavailable(source, location, searchRoot.error)
			}
			return searchRoot
		},
	}
}

function unavailable(
	source: Source,
	location: string,
	cause?: AppError,
): { ok: false; error: SourceUnavailableError } {
	const reason = cause ? `: ${cause.message}` : ""
	return {
		error: {
			cause,
			location,
			message: `Source '${source.name}' is unavailable (${location})${reason}`,
			source: source.name,
			type: "source_unavailable",
		},
		ok: false,
	}
}
