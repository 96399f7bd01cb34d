import { safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { RepoHandle } from "@/repo/handle"
import { joinAbsolute } from "@/types/coerce"
import { runGit } from "@/utils/git"

export async function isGitRepo(handle: RepoHandle): Promise<boolean> {
	const stats = await safeStat(joinAbsolute(handle.root, ".git"))
	return stats.ok && stats.value !== null
}

/**
 * Stage everything and commit. Resolves to false when the repository is not
 * under git or there was nothing to commit.
 */
export async function commitChanges(
	handle: RepoHandle,
	message: string,
): Promise<IoResult<boolean>> {
	if (!(await isGitRepo(handle))) {
		return { ok: true, value: false }
	}

	const added = await runGit(["add", "-A"], handle.root)
	if (!added.ok) {
		return added
	}

	const status = await runGit(["status", "--porcelain"], handle.root)
	if (!status.ok) {
		return status
	}
	if (!status.value) {
		return { ok: true, value: false }
	}

	const committed = await runGit(["commit", "--quiet", "-m", message], handle.root)
	if (!committed.ok) {
		return committed
	}
	return { ok: true, value: true }
}

/**
 * Commit without failing the caller: a git failure becomes a warning.
 */
export async function commitBestEffort(
	handle: RepoHandle,
	message: string,
	warnings: string[],
): Promise<void> {
	const committed = await commitChanges(handle, message)
	if (!committed.ok) {
		warnings.push(`Could not commit changes: ${committed.error.message}`)
	}
}
