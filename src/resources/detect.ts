import path from "node:path"
import { readTextFile, safeStat } from "@/io/fs"
import { parseFrontmatter } from "@/resources/frontmatter"
import { MARKDOWN_EXTENSION } from "@/resources/markdown"
import { PACKAGE_EXTENSION } from "@/resources/package"
import { isSkillDir } from "@/resources/skill"
import type { ResourceLoadError } from "@/resources/types"
import type { AbsolutePath, ResourceType } from "@/types/branded"
import type { Result } from "@/types/error"

const AGENT_KEYS = ["type", "instructions", "capabilities"]

/**
 * Classify a path as a resource type.
 *
 * Location wins over content: a file under an `agents` directory is an agent
 * even if its frontmatter looks like a command. Markdown without agent keys
 * (type, instructions, capabilities) is a command.
 */
export async function detectType(
	targetPath: AbsolutePath,
): Promise<Result<ResourceType, ResourceLoadError>> {
	if (targetPath.endsWith(PACKAGE_EXTENSION)) {
		return { ok: true, value: "package" }
	}

	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return {
			error: {
				message: `Path does not exist: ${targetPath}`,
				path: targetPath,
				target: "resource",
				type: "not_found",
			},
			ok: false,
		}
	}

	if (stats.value.isDirectory()) {
		if (await isSkillDir(targetPath)) {
			return { ok: true, value: "skill" }
		}
		return {
			error: {
				field: "path",
				message: `Directory is not a skill (no SKILL.md): ${targetPath}`,
				path: targetPath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	if (!targetPath.endsWith(MARKDOWN_EXTENSION)) {
		return {
			error: {
				field: "path",
				message: `Unsupported resource file: ${targetPath}`,
				path: targetPath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	// The closest agents/ or commands/ ancestor decides.
	const segments = path.dirname(targetPath).split(path.sep).reverse()
	for (const segment of segments) {
		if (segment === "agents") {
			return { ok: true, value: "agent" }
		}
		if (segment === "commands") {
			return { ok: true, value: "command" }
		}
	}

	const contents = await readTextFile(targetPath)
	if (!contents.ok) {
		return contents
	}
	const frontmatter = parseFrontmatter(contents.value, targetPath)
	if (!frontmatter.ok) {
		return { ok: true, value: "command" }
	}

	const keys = Object.keys(frontmatter.value.data)
	if (keys.some((key) => AGENT_KEYS.includes(key))) {
		return { ok: true, value: "agent" }
	}
	return { ok: true, value: "command" }
}
