import path from "node:path"
import type { AbsolutePath, ResourceName, ResourceType } from "@/types/branded"
import { coerceResourceName, nameSegmentProblem } from "@/types/coerce"
import type { Result, ValidationError } from "@/types/error"

/**
 * Derive a name from a file path: the path relative to baseDir (or the
 * nearest ancestor called ancestorName), without the extension. Falls back
 * to the basename.
 */
export function deriveNestedName(
	filePath: AbsolutePath,
	extension: string,
	ancestorName: string,
	baseDir?: AbsolutePath,
): string {
	const base = baseDir ?? findAncestor(filePath, ancestorName)
	const stripped = stripExtension(path.basename(filePath), extension)
	if (!base) {
		return stripped
	}

	const relative = path.relative(base, filePath)
	if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
		return stripped
	}

	return stripExtension(relative.split(path.sep).join("/"), extension)
}

function stripExtension(value: string, extension: string): string {
	return value.endsWith(extension) ? value.slice(0, -extension.length) : value
}

function findAncestor(filePath: string, ancestorName: string): string | null {
	let current = path.dirname(filePath)
	while (true) {
		if (path.basename(current) === ancestorName) {
			return current
		}
		const parent = path.dirname(current)
		if (parent === current) {
			return null
		}
		current = parent
	}
}

export function validateResourceName(
	name: string,
	type: ResourceType,
	allowNested: boolean,
	filePath?: AbsolutePath,
): Result<ResourceName, ValidationError> {
	const coerced = coerceResourceName(name, allowNested)
	if (coerced) {
		return { ok: true, value: coerced }
	}

	const segments = name.split("/")
	const reason =
		!allowNested && segments.length > 1
			? "must not contain '/'"
			: (segments.map(nameSegmentProblem).find((problem) => problem !== null) ??
				"is invalid")

	return {
		error: {
			field: "name",
			message: `Invalid ${type} name '${name}': ${reason}.`,
			path: filePath,
			source: "manual",
			type: "validation",
		},
		ok: false,
	}
}
