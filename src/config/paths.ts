import os from "node:os"
import path from "node:path"
import type { Env } from "@/env"
import type { AbsolutePath } from "@/types/branded"
import { coerceAbsolutePathDirect } from "@/types/coerce"

export const CONFIG_DIRNAME = "airepo"
export const CONFIG_FILENAME = "airepo.yaml"

/**
 * Where the repository lives, decided once at startup:
 * AIREPO_PATH, then `repo.path` from the config file, then
 * `$XDG_DATA_HOME/airepo/repo`.
 */
export function resolveRepoRoot(
	environment: Pick<Env, "AIREPO_PATH" | "HOME" | "XDG_DATA_HOME">,
	configuredPath: string | undefined,
	cwd: string,
): AbsolutePath {
	const home = homeDir(environment)
	const explicit = environment.AIREPO_PATH ?? configuredPath
	if (explicit) {
		return absolute(path.resolve(cwd, expandHome(explicit, home)))
	}

	const dataHome = environment.XDG_DATA_HOME ?? path.join(home, ".local", "share")
	return absolute(path.resolve(dataHome, CONFIG_DIRNAME, "repo"))
}

/**
 * AIREPO_CONFIG, else `$XDG_CONFIG_HOME/airepo/airepo.yaml`.
 */
export function resolveConfigPath(
	environment: Pick<Env, "AIREPO_CONFIG" | "HOME" | "XDG_CONFIG_HOME">,
	cwd: string,
): AbsolutePath {
	const home = homeDir(environment)
	if (environment.AIREPO_CONFIG) {
		return absolute(path.resolve(cwd, expandHome(environment.AIREPO_CONFIG, home)))
	}

	const configHome = environment.XDG_CONFIG_HOME ?? path.join(home, ".config")
	return absolute(path.resolve(configHome, CONFIG_DIRNAME, CONFIG_FILENAME))
}

export function expandHome(value: string, home: string): string {
	if (value === "~") {
		return home
	}
	if (value.startsWith("~/")) {
		return path.join(home, value.slice(2))
	}
	return value
}

function homeDir(environment: Pick<Env, "HOME">): string {
	return environment.HOME ?? os.homedir()
}

function absolute(value: string): AbsolutePath {
	const coerced = coerceAbsolutePathDirect(value)
	if (!coerced) {
		throw new Error(`Expected an absolute path, got '${value}'.`)
	}
	return coerced
}
