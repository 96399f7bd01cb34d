import { ensureDir, readOptionalTextFile, writeTextFile } from "@/io/fs"
import type { IoResult } from "@/io/types"
import { isGitRepo } from "@/repo/git"
import { type RepoHandle, typeDir, WORKSPACE_DIRNAME } from "@/repo/handle"
import { createEmptyManifest, serializeSourceManifest } from "@/sources/manifest"
import { RESOURCE_TYPES } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import { runGit } from "@/utils/git"

export interface InitOutcome {
	created: boolean
	gitInitialized: boolean
	warnings: string[]
}

const GITIGNORE_ENTRY = `${WORKSPACE_DIRNAME}/`

/**
 * Create the repository layout. Safe to run on an existing repository.
 */
export async function initRepo(handle: RepoHandle): Promise<IoResult<InitOutcome>> {
	const warnings: string[] = []
	const manifest = await readOptionalTextFile(handle.manifestPath)
	if (!manifest.ok) {
		return manifest
	}

	for (const dir of [
		handle.root,
		handle.metadataDir,
		...RESOURCE_TYPES.map((type) => typeDir(handle, type)),
	]) {
		const ensured = await ensureDir(dir)
		if (!ensured.ok) {
			return ensured
		}
	}

	if (manifest.value === null) {
		const written = await writeTextFile(
			handle.manifestPath,
			serializeSourceManifest(createEmptyManifest()),
		)
		if (!written.ok) {
			return written
		}
	}

	const gitignorePath = joinAbsolute(handle.root, ".gitignore")
	const gitignore = await readOptionalTextFile(gitignorePath)
	if (!gitignore.ok) {
		return gitignore
	}
	const existing = gitignore.value ?? ""
	const lines = existing.split("\n").map((line) => line.trim())
	if (!lines.includes(GITIGNORE_ENTRY)) {
		const prefix = existing && !existing.endsWith("\n") ? `${existing}\n` : existing
		const written = await writeTextFile(gitignorePath, `${prefix}${GITIGNORE_ENTRY}\n`)
		if (!written.ok) {
			return written
		}
	}

	let gitInitialized = false
	if (!(await isGitRepo(handle))) {
		const initialized = await runGit(["init", "--quiet"], handle.root)
		if (initialized.ok) {
			gitInitialized = true
		} else {
			warnings.push(`Could not initialize git: ${initialized.error.message}`)
		}
	}

	return {
		ok: true,
		value: { created: manifest.value === null, gitInitialized, warnings },
	}
}
