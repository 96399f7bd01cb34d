import { parse, stringify } from "yaml"
import { z } from "zod"
import { readOptionalTextFile, writeTextFile } from "@/io/fs"
import { parseResourceRef } from "@/resources/ref"
import { parseTool } from "@/tools/registry"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { IoError, ParseError, Result, ValidationError } from "@/types/error"

export const PROJECT_MANIFEST_FILENAME = "ai.package.yaml"

const ProjectManifestSchema = z.object({
	install: z
		.object({ targets: z.array(z.string()).nullish() })
		.nullish(),
	resources: z.array(z.string()).nullish(),
	targets: z.array(z.string()).nullish(),
})

/**
 * Per-project install list: which resources the project uses and which tools
 * it installs them into.
 */
export interface ProjectManifest {
	resources: string[]
	install: { targets: string[] }
}

export type ProjectManifestError = IoError | ParseError | ValidationError

export function projectManifestPath(projectRoot: AbsolutePath): AbsolutePath {
	return joinAbsolute(projectRoot, PROJECT_MANIFEST_FILENAME)
}

/**
 * Load ai.package.yaml, or null when the project has none. A top-level
 * `targets` list from older files moves under `install`.
 */
export async function loadProjectManifest(
	projectRoot: AbsolutePath,
): Promise<Result<ProjectManifest | null, ProjectManifestError>> {
	const manifestPath = projectManifestPath(projectRoot)
	const contents = await readOptionalTextFile(manifestPath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: null }
	}

	let raw: unknown
	try {
		raw = parse(contents.value)
	} catch (error) {
		return {
			error: {
				message: `Invalid YAML in ${manifestPath}.`,
				path: manifestPath,
				rawError: error instanceof Error ? error : undefined,
				source: "project_manifest",
				type: "parse",
			},
			ok: false,
		}
	}

	const result = ProjectManifestSchema.safeParse(raw ?? {})
	if (!result.success) {
		return {
			error: {
				field: "resources",
				message: `Invalid project manifest ${manifestPath}.`,
				path: manifestPath,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	const installTargets = result.data.install?.targets ?? []
	const manifest: ProjectManifest = {
		install: {
			targets: installTargets.length > 0 ? installTargets : (result.data.targets ?? []),
		},
		resources: result.data.resources ?? [],
	}

	const valid = validateProjectManifest(manifest)
	if (!valid.ok) {
		return { error: { ...valid.error, path: manifestPath }, ok: false }
	}
	return { ok: true, value: manifest }
}

export async function saveProjectManifest(
	projectRoot: AbsolutePath,
	manifest: ProjectManifest,
): Promise<Result<void, IoError | ValidationError>> {
	const valid = validateProjectManifest(manifest)
	if (!valid.ok) {
		return valid
	}

	const document: Record<string, unknown> = { resources: manifest.resources }
	if (manifest.install.targets.length > 0) {
		document.install = { targets: manifest.install.targets }
	}
	return writeTextFile(projectManifestPath(projectRoot), stringify(document))
}

export function validateProjectManifest(
	manifest: ProjectManifest,
): Result<void, ValidationError> {
	for (const entry of manifest.resources) {
		const ref = parseResourceRef(entry)
		if (!ref.ok) {
			return {
				error: { ...ref.error, message: `Invalid resource '${entry}': ${ref.error.message}` },
				ok: false,
			}
		}
	}

	for (const target of manifest.install.targets) {
		const tool = parseTool(target)
		if (!tool.ok) {
			return tool
		}
	}

	return { ok: true, value: undefined }
}

export function addProjectResource(manifest: ProjectManifest, ref: string): ProjectManifest {
	if (manifest.resources.includes(ref)) {
		return manifest
	}
	return { ...manifest, resources: [...manifest.resources, ref] }
}

export function removeProjectResource(manifest: ProjectManifest, ref: string): ProjectManifest {
	return { ...manifest, resources: manifest.resources.filter((entry) => entry !== ref) }
}
