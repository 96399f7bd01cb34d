import path from "node:path"
import type {
	CleanedLink,
	InstalledEntry,
	InstalledListing,
	InstallReport,
	LinkResult,
	UninstallReport,
} from "@/install/types"
import {
	createSymlink,
	ensureDir,
	readDirEntries,
	readLinkTarget,
	removePath,
	safeLstat,
	safeStat,
} from "@/io/fs"
import type { IoResult } from "@/io/fs"
import { type RepoHandle, resourcePath } from "@/repo/handle"
import { getResource } from "@/repo/store"
import { getKind } from "@/resources/kinds"
import { MARKDOWN_EXTENSION } from "@/resources/markdown"
import { formatResourceRef } from "@/resources/ref"
import type { Resource, ResourceRef } from "@/resources/types"
import { supportsType } from "@/tools/registry"
import type { InstallableType, ResolvedTool, ToolId } from "@/tools/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { IoError, NotFoundError, Result, ValidationError } from "@/types/error"

const INSTALLABLE_TYPES: InstallableType[] = ["command", "skill", "agent"]

/**
 * Link resources into every tool that supports their type. A package
 * installs its members; each member is reported on its own and a missing
 * member fails only itself.
 */
export async function installResources(
	handle: RepoHandle,
	refs: ResourceRef[],
	tools: ResolvedTool[],
): Promise<IoResult<InstallReport>> {
	const report: InstallReport = { failed: [], installed: [], warnings: [] }

	for (const ref of refs) {
		const loaded = await getResource(handle, ref)
		if (!loaded.ok) {
			if (loaded.error.type === "io") {
				return { error: loaded.error, ok: false }
			}
			report.failed.push({ error: loaded.error, message: loaded.error.message, ref })
			continue
		}

		const members = loaded.value.type === "package" ? loaded.value.resources : [ref]
		for (const member of members) {
			const resource = member === ref ? loaded : await getResource(handle, member)
			if (!resource.ok) {
				if (resource.error.type === "io") {
					return { error: resource.error, ok: false }
				}
				report.failed.push({
					error: resource.error,
					message: resource.error.message,
					ref: member,
				})
				continue
			}

			const linked = await installResource(handle, resource.value, tools, report.warnings)
			if (!linked.ok) {
				if (linked.error.type === "io") {
					return { error: linked.error, ok: false }
				}
				report.failed.push({ error: linked.error, message: linked.error.message, ref: member })
				continue
			}
			report.installed.push({ links: linked.value, ref: member })
		}
	}

	return { ok: true, value: report }
}

/**
 * Link one resource into each supporting tool. Idempotent: a live link or a
 * real file already at the link path is left alone; a dangling link is
 * replaced.
 */
export async function installResource(
	handle: RepoHandle,
	resource: Resource,
	tools: ResolvedTool[],
	warnings: string[],
): Promise<Result<LinkResult[], IoError | ValidationError>> {
	if (resource.type === "package") {
		return unsupported(resource.type, formatResourceRef(resource), tools)
	}
	const type = resource.type
	const kind = getKind(type)
	const canonical = resourcePath(handle, type, resource.name)
	const supporting = tools.filter((tool) => supportsType(tool, type))
	if (supporting.length === 0) {
		return unsupported(type, formatResourceRef(resource), tools)
	}

	const links: LinkResult[] = []
	for (const tool of supporting) {
		const dir = tool.dirs[type]
		if (!dir) {
			continue
		}
		const linkPath = joinAbsolute(dir, kind.linkName(resource.name))
		const parent = await ensureDir(path.dirname(linkPath))
		if (!parent.ok) {
			return parent
		}

		const existing = await safeLstat(linkPath)
		if (!existing.ok) {
			return existing
		}

		if (existing.value && !existing.value.isSymbolicLink()) {
			warnings.push(`'${resource.name}' in ${tool.id} is not a symlink (manual installation?)`)
			links.push({ linkPath, status: "occupied", tool: tool.id })
			continue
		}

		if (existing.value) {
			const target = await safeStat(linkPath)
			if (!target.ok) {
				return target
			}
			if (target.value) {
				links.push({ linkPath, status: "unchanged", tool: tool.id })
				continue
			}
			const removed = await removePath(linkPath)
			if (!removed.ok) {
				return removed
			}
		}

		const created = await createSymlink(canonical, linkPath, kind.entry)
		if (!created.ok) {
			return created
		}
		links.push({
			linkPath,
			status: existing.value ? "replaced" : "created",
			tool: tool.id,
		})
	}

	return { ok: true, value: links }
}

/**
 * A resource with no link to remove. Entries that stood in for links but
 * are not symlinks travel along as warnings.
 */
export type NotInstalledError = NotFoundError & { warnings: string[] }

/**
 * Remove a resource's links from each tool. Succeeds when at least one link
 * was removed; entries that are not symlinks are reported and kept.
 */
export async function uninstallResource(
	ref: ResourceRef,
	tools: ResolvedTool[],
): Promise<Result<UninstallReport, IoError | NotInstalledError | ValidationError>> {
	if (ref.type === "package") {
		return unsupported(ref.type, formatResourceRef(ref), tools)
	}
	const type = ref.type
	const kind = getKind(type)
	const removedFrom: ToolId[] = []
	const warnings: string[] = []

	for (const tool of tools) {
		const dir = tool.dirs[type]
		if (!dir) {
			continue
		}
		const linkPath = joinAbsolute(dir, kind.linkName(ref.name))
		const existing = await safeLstat(linkPath)
		if (!existing.ok) {
			return existing
		}
		if (!existing.value) {
			continue
		}

		if (!existing.value.isSymbolicLink()) {
			warnings.push(`'${ref.name}' in ${tool.id} is not a symlink (manual installation?)`)
			continue
		}

		const removed = await removePath(linkPath)
		if (!removed.ok) {
			return removed
		}
		removedFrom.push(tool.id)
	}

	if (removedFrom.length === 0) {
		return {
			error: {
				message: `resource '${formatResourceRef(ref)}' is not installed`,
				target: formatResourceRef(ref),
				type: "not_found",
				warnings,
			},
			ok: false,
		}
	}

	return { ok: true, value: { ref, removedFrom, warnings } }
}

/**
 * Every resource linked into the given tools, one entry per type and name.
 * Health is read from the link target; a dangling link is listed as broken
 * under the name the link itself carries.
 */
export async function listInstalled(tools: ResolvedTool[]): Promise<IoResult<InstalledListing>> {
	const byKey = new Map<string, InstalledEntry>()
	const warnings: string[] = []

	for (const tool of tools) {
		for (const type of INSTALLABLE_TYPES) {
			const dir = tool.dirs[type]
			if (!dir) {
				continue
			}

			const links = await collectLinks(dir, type)
			if (!links.ok) {
				return links
			}

			for (const link of links.value) {
				const key = `${type}/${link.name}`
				const known = byKey.get(key)
				if (known) {
					if (!known.tools.includes(tool.id)) {
						known.tools.push(tool.id)
					}
					continue
				}

				const entry = await inspectLink(link.path, link.name, type, warnings)
				if (!entry.ok) {
					return entry
				}
				byKey.set(key, { ...entry.value, tools: [tool.id] })
			}
		}
	}

	const entries = [...byKey.values()].sort(
		(a, b) =>
			INSTALLABLE_TYPES.indexOf(a.type) - INSTALLABLE_TYPES.indexOf(b.type) ||
			a.name.localeCompare(b.name),
	)
	return { ok: true, value: { entries, warnings } }
}

/**
 * True when at least one tool holds a live link for the resource.
 */
export async function isInstalled(
	ref: ResourceRef,
	tools: ResolvedTool[],
): Promise<IoResult<boolean>> {
	if (ref.type === "package") {
		return { ok: true, value: false }
	}
	const type = ref.type
	for (const tool of tools) {
		const dir = tool.dirs[type]
		if (!dir) {
			continue
		}
		const linkPath = joinAbsolute(dir, getKind(type).linkName(ref.name))
		const existing = await safeLstat(linkPath)
		if (!existing.ok) {
			return existing
		}
		if (!existing.value?.isSymbolicLink()) {
			continue
		}
		const target = await safeStat(linkPath)
		if (!target.ok) {
			return target
		}
		if (target.value) {
			return { ok: true, value: true }
		}
	}
	return { ok: true, value: false }
}

export interface CleanOptions {
	dryRun?: boolean
}

/**
 * Remove every link in the given tools that points into the repository.
 * Links elsewhere and real files are left alone; ai.package.yaml is not
 * touched, so `install` restores what was removed.
 */
export async function cleanInstalled(
	handle: RepoHandle,
	tools: ResolvedTool[],
	options: CleanOptions = {},
): Promise<IoResult<CleanedLink[]>> {
	const cleaned: CleanedLink[] = []
	for (const tool of tools) {
		for (const type of INSTALLABLE_TYPES) {
			const dir = tool.dirs[type]
			if (!dir) {
				continue
			}

			const links = await collectLinks(dir, type)
			if (!links.ok) {
				return links
			}

			for (const link of links.value) {
				const target = await readLinkTarget(link.path)
				if (!target.ok) {
					return target
				}
				if (!isInside(handle.root, target.value)) {
					continue
				}
				if (!options.dryRun) {
					const removed = await removePath(link.path)
					if (!removed.ok) {
						return removed
					}
				}
				cleaned.push({ linkPath: link.path, name: link.name, tool: tool.id, type })
			}
		}
	}
	return { ok: true, value: cleaned }
}

function isInside(root: AbsolutePath, target: AbsolutePath): boolean {
	const relative = path.relative(root, target)
	return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative)
}

interface FoundLink {
	name: string
	path: AbsolutePath
}

const MAX_LINK_DEPTH = 10

/**
 * Symlinks in a tool directory. Commands and agents may sit in nested
 * directories, giving names like "team/api/deploy"; skills are one level.
 */
async function collectLinks(
	dir: AbsolutePath,
	type: InstallableType,
	prefix = "",
	remainingDepth = type === "skill" ? 0 : MAX_LINK_DEPTH,
): Promise<IoResult<FoundLink[]>> {
	const entries = await readDirEntries(dir)
	if (!entries.ok) {
		return entries
	}

	const links: FoundLink[] = []
	for (const entry of entries.value) {
		const entryPath = joinAbsolute(dir, entry.name)
		if (entry.isSymbolicLink()) {
			links.push({ name: `${prefix}${linkNameToResource(entry.name, type)}`, path: entryPath })
			continue
		}

		if (entry.isDirectory() && remainingDepth > 0) {
			const nested = await collectLinks(
				entryPath,
				type,
				`${prefix}${entry.name}/`,
				remainingDepth - 1,
			)
			if (!nested.ok) {
				return nested
			}
			links.push(...nested.value)
		}
	}
	return { ok: true, value: links }
}

function linkNameToResource(fileName: string, type: InstallableType): string {
	if (type !== "skill" && fileName.endsWith(MARKDOWN_EXTENSION)) {
		return fileName.slice(0, -MARKDOWN_EXTENSION.length)
	}
	return fileName
}

async function inspectLink(
	linkPath: AbsolutePath,
	name: string,
	type: InstallableType,
	warnings: string[],
): Promise<IoResult<Omit<InstalledEntry, "tools">>> {
	const target = await readLinkTarget(linkPath)
	if (!target.ok) {
		return target
	}

	const stats = await safeStat(target.value)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return { ok: true, value: { health: "broken", name, path: target.value, type } }
	}

	const loaded = await getKind(type).load(target.value)
	if (!loaded.ok) {
		if (loaded.error.type === "io") {
			return { error: loaded.error, ok: false }
		}
		warnings.push(`Could not read installed ${type} '${name}': ${loaded.error.message}`)
		return { ok: true, value: { health: "ok", name, path: target.value, type } }
	}

	return {
		ok: true,
		value: {
			description: loaded.value.description,
			health: "ok",
			name,
			path: target.value,
			type,
		},
	}
}

function unsupported(
	type: string,
	label: string,
	tools: ResolvedTool[],
): { ok: false; error: ValidationError } {
	const names = tools.map((tool) => tool.id).join(", ") || "none"
	return {
		error: {
			field: "target",
			message: `No target tool supports ${type}s, cannot install '${label}' (targets: ${names}).`,
			source: "manual",
			type: "validation",
		},
		ok: false,
	}
}

/**
 * "2 added, 1 skipped, 0 failed". A resource counts as added when at least
 * one of its links was created or replaced.
 */
export function formatInstallSummary(report: InstallReport): string {
	const added = report.installed.filter((entry) =>
		entry.links.some((link) => link.status === "created" || link.status === "replaced"),
	).length
	const skipped = report.installed.length - added
	return `${added} added, ${skipped} skipped, ${report.failed.length} failed`
}
