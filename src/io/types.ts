import type { AbsolutePath } from "@/types/branded"
import type { IoError, Result } from "@/types/error"

export type { IoError } from "@/types/error"

export type IoResult<T> = Result<T, IoError>

export function ioFailure(
	message: string,
	targetPath: AbsolutePath,
	operation: string,
	error?: unknown,
): { ok: false; error: IoError } {
	return {
		error: {
			message,
			operation,
			path: targetPath,
			rawError: error instanceof Error ? error : undefined,
			type: "io",
		},
		ok: false,
	}
}
