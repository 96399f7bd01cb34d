import type { Dirent } from "node:fs"
import {
	cp,
	lstat,
	mkdir,
	readdir,
	readFile,
	readlink,
	rm,
	stat,
	symlink,
	writeFile,
} from "node:fs/promises"
import path from "node:path"
import type { IoResult } from "@/io/types"
import { ioFailure } from "@/io/types"
import type { AbsolutePath } from "@/types/branded"

// Re-export types for convenience
export type { IoError, IoResult } from "@/io/types"

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>
type LStatResult = IoResult<Awaited<ReturnType<typeof lstat>> | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(
			`Unable to access ${targetPath}.`,
			toAbsolutePath(targetPath),
			"stat",
			error,
		)
	}
}

export async function safeLstat(targetPath: string): Promise<LStatResult> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(
			`Unable to access ${targetPath}.`,
			toAbsolutePath(targetPath),
			"lstat",
			error,
		)
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return ioFailure(
			`Expected directory at ${targetPath}.`,
			toAbsolutePath(targetPath),
			"mkdir",
		)
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(
				`Unable to create ${targetPath}.`,
				toAbsolutePath(targetPath),
				"mkdir",
				error,
			)
		}
	}

	return { ok: true, value: undefined }
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(
			`Unable to read ${targetPath}.`,
			toAbsolutePath(targetPath),
			"readFile",
			error,
		)
	}
}

/**
 * Read a text file, treating a missing file as null.
 */
export async function readOptionalTextFile(
	targetPath: string,
): Promise<IoResult<string | null>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}
		return ioFailure(
			`Unable to read ${targetPath}.`,
			toAbsolutePath(targetPath),
			"readFile",
			error,
		)
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	const parent = await ensureDir(path.dirname(targetPath))
	if (!parent.ok) {
		return parent
	}

	try {
		await writeFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(
			`Unable to write ${targetPath}.`,
			toAbsolutePath(targetPath),
			"writeFile",
			error,
		)
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(
			`Unable to remove ${targetPath}.`,
			toAbsolutePath(targetPath),
			"rm",
			error,
		)
	}
}

/**
 * List directory entries. A missing directory lists as empty.
 */
export async function readDirEntries(targetPath: string): Promise<IoResult<Dirent[]>> {
	try {
		const entries = await readdir(targetPath, { withFileTypes: true })
		entries.sort((a, b) => a.name.localeCompare(b.name))
		return { ok: true, value: entries }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: [] }
		}
		return ioFailure(
			`Unable to read ${targetPath}.`,
			toAbsolutePath(targetPath),
			"readdir",
			error,
		)
	}
}

export async function createSymlink(
	sourcePath: AbsolutePath,
	linkPath: string,
	kind: "dir" | "file",
): Promise<IoResult<void>> {
	try {
		const linkType = process.platform === "win32" && kind === "dir" ? "junction" : kind
		await symlink(sourcePath, linkPath, linkType)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(
			`Unable to symlink ${linkPath}.`,
			toAbsolutePath(linkPath),
			"symlink",
			error,
		)
	}
}

export async function copyPath(
	sourcePath: AbsolutePath,
	targetPath: string,
): Promise<IoResult<void>> {
	try {
		await cp(sourcePath, targetPath, { dereference: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(
			`Unable to copy ${sourcePath} to ${targetPath}.`,
			toAbsolutePath(targetPath),
			"cp",
			error,
		)
	}
}

/**
 * Resolve a symlink to the absolute path it points at. Relative link
 * targets resolve against the link's directory.
 */
export async function readLinkTarget(linkPath: string): Promise<IoResult<AbsolutePath>> {
	try {
		const target = await readlink(linkPath)
		return {
			ok: true,
			value: toAbsolutePath(path.resolve(path.dirname(linkPath), target)),
		}
	} catch (error) {
		return ioFailure(
			`Unable to read link ${linkPath}.`,
			toAbsolutePath(linkPath),
			"readlink",
			error,
		)
	}
}

export function toAbsolutePath(value: string): AbsolutePath {
	const resolved = path.isAbsolute(value) ? path.normalize(value) : path.resolve(value)
	return resolved as AbsolutePath
}

export function isNotFound(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		(error as { code?: string }).code === "ENOENT"
	)
}
