import type { ZodError } from "zod"
import type { AbsolutePath } from "@/types/branded"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: AbsolutePath
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: AbsolutePath
	  })

export interface ParseError extends BaseError {
	type: "parse"
	source: string
	path?: AbsolutePath
}

export interface IoError extends BaseError {
	type: "io"
	path: AbsolutePath
	operation: string
}

export interface ConflictError extends BaseError {
	type: "conflict"
	target: string
	path?: AbsolutePath
}

export interface NotFoundError extends BaseError {
	type: "not_found"
	target: string
	path?: AbsolutePath
}

/**
 * A configured source could not be turned into a local directory:
 * the path is gone or the clone failed.
 */
export interface SourceUnavailableError extends BaseError {
	type: "source_unavailable"
	source: string
	location: string
}

/**
 * Raised only when every configured source failed during a sync.
 */
export interface SyncError extends BaseError {
	type: "sync"
	failed: number
}

export type AppError =
	| ValidationError
	| ParseError
	| IoError
	| ConflictError
	| NotFoundError
	| SourceUnavailableError
	| SyncError

export type Result<T, E extends BaseError = AppError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
