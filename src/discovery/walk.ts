import { readDirEntries, safeStat } from "@/io/fs"
import type { IoResult } from "@/io/fs"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

export const MAX_SEARCH_DEPTH = 5

const SKIPPED_DIRS = new Set([
	"__pycache__",
	"build",
	"dist",
	"node_modules",
	"target",
	"vendor",
	"venv",
])

type DirFilter = (name: string, dirPath: AbsolutePath) => boolean | Promise<boolean>

export interface WalkOptions {
	maxDepth?: number
	/** Directories to leave out of the walk entirely. */
	skipDir?: DirFilter
}

/**
 * Hidden directories and common build or dependency folders.
 */
export function isSkippedDir(name: string): boolean {
	return name.startsWith(".") || SKIPPED_DIRS.has(name)
}

/**
 * Files below root whose name passes `matches`, in sorted traversal order.
 * Symlinked directories are followed; a missing root yields nothing.
 */
export async function findFiles(
	root: AbsolutePath,
	matches: (fileName: string) => boolean,
	options: WalkOptions = {},
): Promise<IoResult<AbsolutePath[]>> {
	const found: AbsolutePath[] = []
	const maxDepth = options.maxDepth ?? MAX_SEARCH_DEPTH

	const visit = async (dir: AbsolutePath, depth: number): Promise<IoResult<void>> => {
		const entries = await readDirEntries(dir)
		if (!entries.ok) {
			return entries
		}

		for (const entry of entries.value) {
			const entryPath = joinAbsolute(dir, entry.name)
			const isDir = await resolvesToDirectory(entryPath, entry)
			if (!isDir.ok) {
				return isDir
			}

			if (isDir.value) {
				if (depth >= maxDepth || (await options.skipDir?.(entry.name, entryPath))) {
					continue
				}
				const nested = await visit(entryPath, depth + 1)
				if (!nested.ok) {
					return nested
				}
				continue
			}

			if (matches(entry.name)) {
				found.push(entryPath)
			}
		}

		return { ok: true, value: undefined }
	}

	const walked = await visit(root, 0)
	if (!walked.ok) {
		return walked
	}
	return { ok: true, value: found }
}

/**
 * Directories below root accepted by `isMatch`. A matching directory is not
 * searched further.
 */
export async function findDirs(
	root: AbsolutePath,
	isMatch: (dirPath: AbsolutePath) => Promise<boolean>,
	options: WalkOptions = {},
): Promise<IoResult<AbsolutePath[]>> {
	const found: AbsolutePath[] = []
	const maxDepth = options.maxDepth ?? MAX_SEARCH_DEPTH

	const visit = async (dir: AbsolutePath, depth: number): Promise<IoResult<void>> => {
		if (depth >= maxDepth) {
			return { ok: true, value: undefined }
		}

		const entries = await readDirEntries(dir)
		if (!entries.ok) {
			return entries
		}

		for (const entry of entries.value) {
			const entryPath = joinAbsolute(dir, entry.name)
			const isDir = await resolvesToDirectory(entryPath, entry)
			if (!isDir.ok) {
				return isDir
			}
			if (!isDir.value || (await options.skipDir?.(entry.name, entryPath))) {
				continue
			}

			if (await isMatch(entryPath)) {
				found.push(entryPath)
				continue
			}

			const nested = await visit(entryPath, depth + 1)
			if (!nested.ok) {
				return nested
			}
		}

		return { ok: true, value: undefined }
	}

	const walked = await visit(root, 0)
	if (!walked.ok) {
		return walked
	}
	return { ok: true, value: found }
}

async function resolvesToDirectory(
	entryPath: string,
	entry: { isDirectory(): boolean; isSymbolicLink(): boolean },
): Promise<IoResult<boolean>> {
	if (entry.isDirectory()) {
		return { ok: true, value: true }
	}
	if (!entry.isSymbolicLink()) {
		return { ok: true, value: false }
	}

	// Dangling links are not directories.
	const stats = await safeStat(entryPath)
	if (!stats.ok) {
		return stats
	}
	return { ok: true, value: stats.value?.isDirectory() ?? false }
}
