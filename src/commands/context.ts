import { type AppContext, loadAppContext } from "@/config/config"
import { env } from "@/env"
import { CommandResult } from "@/commands/types"

export async function loadContext(): Promise<CommandResult<AppContext>> {
	const context = await loadAppContext(env, process.cwd())
	if (!context.ok) {
		return CommandResult.failed(context.error)
	}
	return CommandResult.completed(context.value)
}
