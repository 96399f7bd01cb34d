import { detectExistingTools, parseTool } from "@/tools/registry"
import type { ToolDefinition } from "@/tools/types"
import type { AbsolutePath } from "@/types/branded"
import type { IoError, Result, ValidationError } from "@/types/error"

export interface TargetSources {
	/** Tools named on the command line. */
	explicit?: string[]
	projectRoot: AbsolutePath
	/** `install.targets` from the project's ai.package.yaml. */
	manifestTargets?: string[]
	/** Configured default targets. */
	defaults: string[]
}

export type TargetOrigin = "explicit" | "detected" | "manifest" | "default"

export interface ResolvedTargets {
	tools: ToolDefinition[]
	origin: TargetOrigin
}

/**
 * Pick the tools to install into. The first non-empty tier wins: explicit
 * targets, tools already present in the project, the project manifest, then
 * configured defaults.
 */
export async function resolveTargets(
	sources: TargetSources,
): Promise<Result<ResolvedTargets, ValidationError | IoError>> {
	if (sources.explicit && sources.explicit.length > 0) {
		return parseTargets(sources.explicit, "explicit")
	}

	const detected = await detectExistingTools(sources.projectRoot)
	if (!detected.ok) {
		return detected
	}
	if (detected.value.length > 0) {
		return { ok: true, value: { origin: "detected", tools: detected.value } }
	}

	if (sources.manifestTargets && sources.manifestTargets.length > 0) {
		return parseTargets(sources.manifestTargets, "manifest")
	}

	return parseTargets(sources.defaults, "default")
}

export function parseTargets(
	names: string[],
	origin: TargetOrigin,
): Result<ResolvedTargets, ValidationError> {
	const tools: ToolDefinition[] = []
	for (const name of names) {
		const tool = parseTool(name)
		if (!tool.ok) {
			return tool
		}
		if (!tools.includes(tool.value)) {
			tools.push(tool.value)
		}
	}
	return { ok: true, value: { origin, tools } }
}
