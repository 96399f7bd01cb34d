import { parse } from "yaml"
import { z } from "zod"
import { resolveConfigPath, resolveRepoRoot } from "@/config/paths"
import type { Env } from "@/env"
import { readOptionalTextFile } from "@/io/fs"
import { createRepoHandle, type RepoHandle } from "@/repo/handle"
import { parseTool } from "@/tools/registry"
import type { AbsolutePath } from "@/types/branded"
import type { IoError, ParseError, Result, ValidationError } from "@/types/error"

export const DEFAULT_TARGETS = ["claude"]

const str = () => z.string().trim().min(1)

const ConfigSchema = z.object({
	install: z
		.object({
			targets: z.array(str()).default(DEFAULT_TARGETS),
		})
		.default({}),
	repo: z
		.object({
			path: str().optional(),
		})
		.default({}),
})

export type AppConfig = z.infer<typeof ConfigSchema>

export type ConfigError = IoError | ParseError | ValidationError

export interface AppContext {
	config: AppConfig
	configPath: AbsolutePath
	handle: RepoHandle
}

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g

/**
 * Expand `${VAR}` and `${VAR:-default}`. Unset variables without a default
 * expand to an empty string.
 */
export function expandEnvReferences(
	text: string,
	variables: Record<string, string | undefined>,
): string {
	return text.replace(ENV_REFERENCE, (_match, name: string, fallback: string | undefined) => {
		const value = variables[name]
		if (value !== undefined && value !== "") {
			return value
		}
		return fallback ?? ""
	})
}

export function defaultConfig(): AppConfig {
	return ConfigSchema.parse({})
}

export function parseConfig(
	contents: string,
	configPath: AbsolutePath,
	variables: Record<string, string | undefined>,
): Result<AppConfig, ParseError | ValidationError> {
	let raw: unknown
	try {
		raw = parse(expandEnvReferences(contents, variables))
	} catch (error) {
		return {
			error: {
				message: `Invalid YAML in ${configPath}.`,
				path: configPath,
				rawError: error instanceof Error ? error : undefined,
				source: "config",
				type: "parse",
			},
			ok: false,
		}
	}

	const result = ConfigSchema.safeParse(raw ?? {})
	if (!result.success) {
		return {
			error: {
				field: "config",
				message: `Invalid config ${configPath}.`,
				path: configPath,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	for (const target of result.data.install.targets) {
		const tool = parseTool(target)
		if (!tool.ok) {
			return {
				error: { ...tool.error, field: "install.targets", path: configPath },
				ok: false,
			}
		}
	}

	return { ok: true, value: result.data }
}

export async function loadConfig(
	configPath: AbsolutePath,
	variables: Record<string, string | undefined>,
): Promise<Result<AppConfig, ConfigError>> {
	const contents = await readOptionalTextFile(configPath)
	if (!contents.ok) {
		return contents
	}
	if (contents.value === null) {
		return { ok: true, value: defaultConfig() }
	}

	return parseConfig(contents.value, configPath, variables)
}

/**
 * Read the config file and fix the repository root for this process.
 */
export async function loadAppContext(
	environment: Env,
	cwd: string,
	variables: Record<string, string | undefined> = process.env,
): Promise<Result<AppContext, ConfigError>> {
	const configPath = resolveConfigPath(environment, cwd)
	const config = await loadConfig(configPath, variables)
	if (!config.ok) {
		return config
	}

	const root = resolveRepoRoot(environment, config.value.repo.path, cwd)
	return {
		ok: true,
		value: { config: config.value, configPath, handle: createRepoHandle(root) },
	}
}
