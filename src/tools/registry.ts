import path from "node:path"
import { safeStat } from "@/io/fs"
import type { IoResult } from "@/io/fs"
import type { InstallableType, ResolvedTool, ToolDefinition } from "@/tools/types"
import type { AbsolutePath } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"
import type { Result, ValidationError } from "@/types/error"

const TOOL_REGISTRY: ToolDefinition[] = [
	{
		aliases: [],
		detectDir: ".claude",
		dirs: {
			agent: path.join(".claude", "agents"),
			command: path.join(".claude", "commands"),
			skill: path.join(".claude", "skills"),
		},
		displayName: "Claude",
		id: "claude",
	},
	{
		aliases: [],
		detectDir: ".opencode",
		dirs: {
			agent: path.join(".opencode", "agents"),
			command: path.join(".opencode", "commands"),
			skill: path.join(".opencode", "skills"),
		},
		displayName: "OpenCode",
		id: "opencode",
	},
	{
		aliases: ["vscode"],
		detectDir: path.join(".github", "skills"),
		dirs: {
			skill: path.join(".github", "skills"),
		},
		displayName: "GitHub Copilot",
		id: "copilot",
	},
]

export function listTools(): ToolDefinition[] {
	return [...TOOL_REGISTRY]
}

/**
 * Look a tool up by id or alias, case-insensitively.
 */
export function parseTool(value: string): Result<ToolDefinition, ValidationError> {
	const normalized = value.trim().toLowerCase()
	const tool = TOOL_REGISTRY.find(
		(entry) => entry.id === normalized || entry.aliases.includes(normalized),
	)
	if (!tool) {
		const known = TOOL_REGISTRY.map((entry) => entry.id).join(", ")
		return {
			error: {
				field: "target",
				message: `Unknown tool '${value}'. Known tools: ${known}.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}
	return { ok: true, value: tool }
}

export function supportsType(tool: ToolDefinition | ResolvedTool, type: InstallableType): boolean {
	return tool.dirs[type] !== undefined
}

export function resolveTool(tool: ToolDefinition, projectRoot: AbsolutePath): ResolvedTool {
	const dirs: ResolvedTool["dirs"] = {}
	for (const [type, dir] of Object.entries(tool.dirs)) {
		if (isInstallableType(type) && dir) {
			dirs[type] = joinAbsolute(projectRoot, dir)
		}
	}
	return { dirs, displayName: tool.displayName, id: tool.id }
}

/**
 * Tools whose marker directory exists in the project, in registry order.
 */
export async function detectExistingTools(
	projectRoot: AbsolutePath,
): Promise<IoResult<ToolDefinition[]>> {
	const found: ToolDefinition[] = []
	for (const tool of TOOL_REGISTRY) {
		const stats = await safeStat(joinAbsolute(projectRoot, tool.detectDir))
		if (!stats.ok) {
			return stats
		}
		if (stats.value?.isDirectory()) {
			found.push(tool)
		}
	}
	return { ok: true, value: found }
}

const INSTALLABLE_TYPES = new Set<string>(["agent", "command", "skill"])

function isInstallableType(value: string): value is InstallableType {
	return INSTALLABLE_TYPES.has(value)
}
