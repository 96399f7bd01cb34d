import type { AppConfig } from "@/config/config"
import { CommandResult } from "@/commands/types"
import { loadProjectManifest, type ProjectManifest } from "@/tools/project"
import { resolveTool } from "@/tools/registry"
import { type TargetOrigin, resolveTargets } from "@/tools/targets"
import type { ResolvedTool } from "@/tools/types"
import type { AbsolutePath } from "@/types/branded"
import { coerceAbsolutePath } from "@/types/coerce"

export interface TargetFlags {
	target?: string[]
	project?: string
}

export interface ProjectTargets {
	projectRoot: AbsolutePath
	/** null when the project has no ai.package.yaml */
	manifest: ProjectManifest | null
	tools: ResolvedTool[]
	origin: TargetOrigin
}

export async function resolveProjectTargets(
	flags: TargetFlags,
	config: AppConfig,
	cwd: string,
): Promise<CommandResult<ProjectTargets>> {
	const projectRoot = coerceAbsolutePath(flags.project ?? ".", cwd)
	if (!projectRoot) {
		return CommandResult.failed({
			field: "project",
			message: `Invalid project directory '${flags.project ?? ""}'.`,
			source: "manual",
			type: "validation",
		})
	}

	const manifest = await loadProjectManifest(projectRoot)
	if (!manifest.ok) {
		return CommandResult.failed(manifest.error)
	}

	const targets = await resolveTargets({
		defaults: config.install.targets,
		explicit: flags.target,
		manifestTargets: manifest.value?.install.targets,
		projectRoot,
	})
	if (!targets.ok) {
		return CommandResult.failed(targets.error)
	}

	return CommandResult.completed({
		manifest: manifest.value,
		origin: targets.value.origin,
		projectRoot,
		tools: targets.value.tools.map((tool) => resolveTool(tool, projectRoot)),
	})
}
