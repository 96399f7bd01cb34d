import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { initRepo } from "@/repo/init"

export async function repoInit(): Promise<void> {
	consola.info("airepo repo init")

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	const { handle } = context.value

	consola.start(`Initializing repository at ${handle.root}...`)
	const result = await initRepo(handle)
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}

	printWarnings(result.value.warnings)
	if (result.value.gitInitialized) {
		consola.info("Initialized git repository.")
	}
	if (!result.value.created) {
		printOutcome(CommandResult.unchanged(`Repository already initialized at ${handle.root}.`))
		return
	}

	consola.success(`Repository created at ${handle.root}.`)
	printOutcome(CommandResult.completed(undefined))
}
