import { createHash } from "node:crypto"
import { ensureDir, removePath, safeStat } from "@/io/fs"
import { ioFailure, type IoResult } from "@/io/types"
import type { RepoHandle } from "@/repo/handle"
import { generateSourceName, normalizeGitUrl } from "@/sources/id"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import { ensureGitAvailable, runGit } from "@/utils/git"

/**
 * Cache directory for a URL and ref: a readable prefix plus a hash of the
 * normalized URL and ref, so every spelling of one remote shares a clone.
 */
export function cacheDirFor(handle: RepoHandle, url: string, ref?: string): AbsolutePath {
	const key = `${normalizeGitUrl(url)}@${ref ?? ""}`
	const hash = createHash("sha256").update(key).digest("hex").slice(0, 12)
	const prefix = generateSourceName({ url })
	return joinAbsolute(handle.workspaceDir, `${prefix}-${hash}`)
}

/**
 * Resolve a remote repository to a local checkout, cloning on first use and
 * refreshing afterwards.
 */
export async function getOrClone(
	handle: RepoHandle,
	url: string,
	ref?: string,
): Promise<IoResult<AbsolutePath>> {
	const dir = cacheDirFor(handle, url, ref)
	try {
		ensureGitAvailable()
	} catch (error) {
		return ioFailure(
			error instanceof Error ? error.message : "git is required to fetch sources.",
			dir,
			"git",
			error,
		)
	}

	const gitDir = await safeStat(joinAbsolute(dir, ".git"))
	if (!gitDir.ok) {
		return gitDir
	}

	if (gitDir.value) {
		const refreshed = await refresh(dir, ref)
		if (!refreshed.ok) {
			return refreshed
		}
		return { ok: true, value: dir }
	}

	// Anything else at this path is a broken clone.
	const cleared = await removePath(dir)
	if (!cleared.ok) {
		return cleared
	}

	const cloned = await clone(handle, url, dir, ref)
	if (!cloned.ok) {
		return cloned
	}
	return { ok: true, value: dir }
}

export async function removeCached(
	handle: RepoHandle,
	url: string,
	ref?: string,
): Promise<IoResult<boolean>> {
	const dir = cacheDirFor(handle, url, ref)
	const stats = await safeStat(dir)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: false }
	}

	const removed = await removePath(dir)
	if (!removed.ok) {
		return removed
	}
	return { ok: true, value: true }
}

async function clone(
	handle: RepoHandle,
	url: string,
	dir: AbsolutePath,
	ref: string | undefined,
): Promise<IoResult<void>> {
	const parent = await ensureDir(handle.workspaceDir)
	if (!parent.ok) {
		return parent
	}

	const cloned = await runGit(["clone", "--depth", "1", url, dir], handle.workspaceDir)
	if (!cloned.ok) {
		return cloned
	}

	if (!ref) {
		return { ok: true, value: undefined }
	}
	return checkoutRef(dir, ref)
}

async function refresh(dir: AbsolutePath, ref: string | undefined): Promise<IoResult<void>> {
	return checkoutRef(dir, ref ?? "HEAD")
}

/**
 * Fetch a branch, tag or commit and check it out detached. Shallow fetches of
 * arbitrary commits are not always allowed, so a failure deepens the history
 * and checks the ref out by name.
 */
async function checkoutRef(dir: AbsolutePath, ref: string): Promise<IoResult<void>> {
	const fetched = await runGit(["fetch", "--depth", "1", "origin", ref], dir)
	if (fetched.ok) {
		const checkedOut = await runGit(["checkout", "--force", "--detach", "FETCH_HEAD"], dir)
		if (!checkedOut.ok) {
			return checkedOut
		}
		return { ok: true, value: undefined }
	}

	const deepened = await runGit(["fetch", "--depth", "50", "origin"], dir)
	if (!deepened.ok) {
		return fetched
	}

	const checkedOut = await runGit(["checkout", "--force", "--detach", ref], dir)
	if (!checkedOut.ok) {
		return checkedOut
	}
	return { ok: true, value: undefined }
}
