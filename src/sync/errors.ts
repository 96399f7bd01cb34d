import type { SourceFailure, SyncStage } from "@/sync/types"
import type { AppError } from "@/types/error"

export function failSource(
	stage: SyncStage,
	error: AppError,
	fallbackMessage?: string,
): SourceFailure {
	return { error, message: resolveMessage(error, fallbackMessage), stage }
}

function resolveMessage(error: AppError, fallbackMessage?: string): string {
	if (error.message.trim()) {
		return error.message
	}

	if (fallbackMessage?.trim()) {
		return fallbackMessage
	}

	return `Unexpected ${error.type} failure.`
}
