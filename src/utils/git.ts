import { execFile, execSync } from "node:child_process"
import { promisify } from "node:util"
import { ioFailure, type IoResult } from "@/io/types"
import type { AbsolutePath } from "@/types/branded"

const execFileAsync = promisify(execFile)

export function ensureGitAvailable(): void {
	try {
		execSync("git --version", { stdio: "ignore" })
	} catch {
		throw new Error("git is not installed or not in PATH")
	}
}

/**
 * Run git in `cwd` and resolve to its trimmed stdout.
 */
export async function runGit(args: string[], cwd: AbsolutePath): Promise<IoResult<string>> {
	try {
		const { stdout } = await execFileAsync("git", args, { cwd, encoding: "utf8" })
		return { ok: true, value: stdout.trim() }
	} catch (error) {
		return ioFailure(formatGitFailure(args, error), cwd, "git", error)
	}
}

function formatGitFailure(args: string[], error: unknown): string {
	const command = `git ${args.join(" ")}`
	if (typeof error === "object" && error !== null && "stderr" in error) {
		const stderr = String(error.stderr).trim()
		if (stderr) {
			return `${command} failed: ${stderr}`
		}
	}
	return `${command} failed.`
}
