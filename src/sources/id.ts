import { createHash } from "node:crypto"
import path from "node:path"
import type { SourceId, SourceName } from "@/types/branded"
import { MAX_NAME_LENGTH } from "@/types/coerce"

export type SourceLocation = { path: string } | { url: string }

/**
 * Canonical form of a git URL: lowercase, no trailing slash, no .git suffix.
 */
export function normalizeGitUrl(url: string): string {
	let normalized = url.trim().toLowerCase()
	if (normalized.endsWith("/")) normalized = normalized.slice(0, -1)
	if (normalized.endsWith(".git")) normalized = normalized.slice(0, -4)
	return normalized
}

/**
 * Stable identifier derived from the location, so renaming a source keeps
 * its resources attributed to it.
 */
export function computeSourceId(location: SourceLocation): SourceId {
	const canonical =
		"url" in location ? normalizeGitUrl(location.url) : path.resolve(location.path)
	const hash = createHash("sha256").update(canonical).digest("hex").slice(0, 12)
	return `src-${hash}` as SourceId
}

/**
 * Default name for a source: the last segment of its path or URL, reduced to
 * the allowed character set.
 */
export function generateSourceName(location: SourceLocation): SourceName {
	let base: string
	if ("url" in location) {
		const trimmed = location.url.trim().replace(/\/+$/, "").replace(/\.git$/, "")
		base = trimmed.split("/").pop() ?? ""
		if (base.includes(":")) {
			base = base.split(":").pop() ?? ""
		}
	} else {
		base = path.basename(path.resolve(location.path))
	}

	const name = base
		.toLowerCase()
		.replace(/[^a-z0-9-]/g, "-")
		.replace(/-{2,}/g, "-")
		.replace(/^-+/, "")
		.replace(/-+$/, "")
		.slice(0, MAX_NAME_LENGTH)
		.replace(/-+$/, "")

	return (name || "source") as SourceName
}

const GITHUB_HOST_PATTERN = /^(?:https?:\/\/|git@)(?:www\.)?github\.com[/:]/i

export function sourceTypeForUrl(url: string): "github" | "git-url" {
	return GITHUB_HOST_PATTERN.test(url.trim()) ? "github" : "git-url"
}
