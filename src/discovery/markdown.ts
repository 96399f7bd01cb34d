import path from "node:path"
import { dedupeByName, type Discovery } from "@/discovery/types"
import { findDirs, findFiles, isSkippedDir } from "@/discovery/walk"
import type { IoResult } from "@/io/fs"
import { loadCommand } from "@/resources/command"
import { getKind } from "@/resources/kinds"
import { MARKDOWN_EXTENSION } from "@/resources/markdown"
import { isSkillDir } from "@/resources/skill"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

type MarkdownType = "command" | "agent"

const EXCLUDED_FILES = new Set(
	["SKILL.md", "README.md", "REFERENCE.md"].flatMap((name) => {
		const stem = name.slice(0, -MARKDOWN_EXTENSION.length)
		return [
			name,
			`${stem.toLowerCase()}${MARKDOWN_EXTENSION}`,
			`${stem.charAt(0)}${stem.slice(1).toLowerCase()}${MARKDOWN_EXTENSION}`,
		]
	}),
)

function isCandidateFile(fileName: string): boolean {
	return fileName.endsWith(MARKDOWN_EXTENSION) && !EXCLUDED_FILES.has(fileName)
}

function priorityDirs(root: AbsolutePath, dirName: string): AbsolutePath[] {
	return [
		joinAbsolute(root, dirName),
		joinAbsolute(root, ".claude", dirName),
		joinAbsolute(root, ".opencode", dirName),
	]
}

/**
 * Commands in `commands/`, `.claude/commands/` or `.opencode/commands/`,
 * named relative to that folder. When none exist, every markdown file in the
 * tree that loads as a command, outside skill and agent folders.
 */
export async function discoverCommands(
	root: AbsolutePath,
): Promise<IoResult<Discovery<"command">>> {
	const found: Discovery<"command"> = { issues: [], resources: [] }
	const searched = await searchPriorityDirs(root, "command", found)
	if (!searched.ok) {
		return searched
	}

	if (found.resources.length === 0) {
		const fallback = await searchLooseCommands(root, found)
		if (!fallback.ok) {
			return fallback
		}
	}

	return { ok: true, value: { ...found, resources: dedupeByName(found.resources) } }
}

/**
 * Agents in `agents/`, `.claude/agents/` or `.opencode/agents/`. When none
 * exist, any `agents/` folder deeper in the tree.
 */
export async function discoverAgents(
	root: AbsolutePath,
): Promise<IoResult<Discovery<"agent">>> {
	const found: Discovery<"agent"> = { issues: [], resources: [] }
	const searched = await searchPriorityDirs(root, "agent", found)
	if (!searched.ok) {
		return searched
	}

	if (found.resources.length === 0) {
		const fallback = await searchAgentDirs(root, found)
		if (!fallback.ok) {
			return fallback
		}
	}

	return { ok: true, value: { ...found, resources: dedupeByName(found.resources) } }
}

async function searchPriorityDirs<T extends MarkdownType>(
	root: AbsolutePath,
	type: T,
	found: Discovery<T>,
): Promise<IoResult<void>> {
	for (const dir of priorityDirs(root, getKind(type).dirName)) {
		const loaded = await loadFromDir(dir, type, found)
		if (!loaded.ok) {
			return loaded
		}
	}
	return { ok: true, value: undefined }
}

async function loadFromDir<T extends MarkdownType>(
	dir: AbsolutePath,
	type: T,
	found: Discovery<T>,
): Promise<IoResult<void>> {
	const files = await findFiles(dir, isCandidateFile)
	if (!files.ok) {
		return files
	}

	for (const filePath of files.value) {
		const loaded = await getKind(type).load(filePath, { baseDir: dir })
		if (loaded.ok) {
			found.resources.push(loaded.value)
		} else {
			found.issues.push({ message: loaded.error.message, path: filePath })
		}
	}
	return { ok: true, value: undefined }
}

async function searchAgentDirs(
	root: AbsolutePath,
	found: Discovery<"agent">,
): Promise<IoResult<void>> {
	const isAgentsDir = async (dirPath: AbsolutePath) => path.basename(dirPath) === "agents"
	const dirs = await findDirs(root, isAgentsDir, { skipDir: isSkippedDir })
	if (!dirs.ok) {
		return dirs
	}

	for (const dir of dirs.value) {
		const loaded = await loadFromDir(dir, "agent", found)
		if (!loaded.ok) {
			return loaded
		}
	}
	return { ok: true, value: undefined }
}

async function searchLooseCommands(
	root: AbsolutePath,
	found: Discovery<"command">,
): Promise<IoResult<void>> {
	const files = await findFiles(root, isCandidateFile, { skipDir: isOutsideCommands })
	if (!files.ok) {
		return files
	}

	for (const filePath of files.value) {
		const loaded = await loadCommand(filePath)
		if (loaded.ok) {
			found.resources.push(loaded.value)
		} else if (loaded.error.type === "io") {
			found.issues.push({ message: loaded.error.message, path: filePath })
		}
		// Markdown without command frontmatter is ordinary documentation here.
	}
	return { ok: true, value: undefined }
}

async function isOutsideCommands(name: string, dirPath: AbsolutePath): Promise<boolean> {
	if (isSkippedDir(name) || name === "skills" || name === "agents") {
		return true
	}
	return isSkillDir(dirPath)
}
