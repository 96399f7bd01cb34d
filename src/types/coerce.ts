/**
 * Coercion Functions for Branded Types
 *
 * These are the ONLY functions that should create branded type values.
 * Pattern: return the branded value on success, null on failure.
 */

import path from "node:path"
import type {
	AbsolutePath,
	NonEmptyString,
	ResourceName,
	SourceId,
	SourceName,
} from "@/types/branded"

export const MAX_NAME_LENGTH = 64

const NAME_SEGMENT_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/
const SOURCE_ID_PATTERN = /^src-[0-9a-f]{12}$/

// === NON-EMPTY STRING ===

export function coerceNonEmpty(s: string): NonEmptyString | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

// === ABSOLUTE PATH ===

/**
 * Coerce a string to AbsolutePath.
 * Relative paths resolve against basePath; without one they are rejected.
 */
export function coerceAbsolutePath(s: string, basePath?: string): AbsolutePath | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null

	if (path.isAbsolute(trimmed)) {
		return path.normalize(trimmed) as AbsolutePath
	}
	if (!basePath) {
		return null
	}
	return path.resolve(basePath, trimmed) as AbsolutePath
}

/**
 * Coerce a path already known to be absolute (process.cwd(), os.homedir()).
 */
export function coerceAbsolutePathDirect(s: string): AbsolutePath | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return path.normalize(trimmed) as AbsolutePath
}

/**
 * Join segments onto an absolute base. The result stays absolute.
 */
export function joinAbsolute(base: AbsolutePath, ...segments: string[]): AbsolutePath {
	return path.join(base, ...segments) as AbsolutePath
}

// === NAMES ===

/**
 * Explain why a single name segment is invalid, or return null when it is valid.
 */
export function nameSegmentProblem(segment: string): string | null {
	if (segment.length === 0) {
		return "must not be empty"
	}
	if (segment.length > MAX_NAME_LENGTH) {
		return `must be at most ${MAX_NAME_LENGTH} characters`
	}
	if (!NAME_SEGMENT_PATTERN.test(segment)) {
		return "must contain only lowercase letters, digits and hyphens, and must not start or end with a hyphen"
	}
	if (segment.includes("--")) {
		return "must not contain consecutive hyphens"
	}
	return null
}

export function coerceSourceName(s: string): SourceName | null {
	const trimmed = s.trim()
	if (nameSegmentProblem(trimmed) !== null) return null
	return trimmed as SourceName
}

/**
 * Coerce a resource name. Nested names ("api/deploy") are only accepted when
 * allowNested is set.
 */
export function coerceResourceName(s: string, allowNested: boolean): ResourceName | null {
	const trimmed = s.trim()
	const segments = trimmed.split("/")
	if (!allowNested && segments.length > 1) return null
	for (const segment of segments) {
		if (nameSegmentProblem(segment) !== null) return null
	}
	return trimmed as ResourceName
}

export function coerceSourceId(s: string): SourceId | null {
	const trimmed = s.trim()
	if (!SOURCE_ID_PATTERN.test(trimmed)) return null
	return trimmed as SourceId
}
