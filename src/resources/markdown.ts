import { readTextFile, safeStat } from "@/io/fs"
import { type Frontmatter, parseFrontmatter } from "@/resources/frontmatter"
import type { ResourceLoadError } from "@/resources/types"
import type { AbsolutePath, ResourceType } from "@/types/branded"
import type { Result } from "@/types/error"

export const MARKDOWN_EXTENSION = ".md"

/**
 * Read a markdown resource file and split its frontmatter.
 */
export async function readMarkdownResource(
	filePath: AbsolutePath,
	type: ResourceType,
): Promise<Result<Frontmatter, ResourceLoadError>> {
	if (!filePath.endsWith(MARKDOWN_EXTENSION)) {
		return {
			error: {
				field: "path",
				message: `A ${type} must be a ${MARKDOWN_EXTENSION} file: ${filePath}`,
				path: filePath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const stats = await safeStat(filePath)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return {
			error: {
				message: `File does not exist: ${filePath}`,
				path: filePath,
				target: type,
				type: "not_found",
			},
			ok: false,
		}
	}
	if (!stats.value.isFile()) {
		return {
			error: {
				field: "path",
				message: `Expected a file at ${filePath}.`,
				path: filePath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const contents = await readTextFile(filePath)
	if (!contents.ok) {
		return contents
	}

	return parseFrontmatter(contents.value, filePath)
}
