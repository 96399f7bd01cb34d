import { confirm, isCancel } from "@clack/prompts"
import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome } from "@/commands/types"
import { findUnreferencedCaches, formatSize, pruneWorkspace } from "@/workspace/prune"

export interface RepoPruneOptions {
	dryRun: boolean
	yes: boolean
}

export async function repoPrune(options: RepoPruneOptions): Promise<void> {
	consola.info("airepo repo prune")

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	const { handle } = context.value

	const found = await findUnreferencedCaches(handle)
	if (!found.ok) {
		printOutcome(CommandResult.failed(found.error))
		return
	}
	if (found.value.length === 0) {
		printOutcome(CommandResult.unchanged("No unreferenced workspace caches found."))
		return
	}

	const total = found.value.reduce((sum, checkout) => sum + checkout.sizeBytes, 0)
	for (const checkout of found.value) {
		consola.info(`${checkout.name} (${formatSize(checkout.sizeBytes)})`)
	}

	if (!options.dryRun && !options.yes) {
		const confirmed = await confirm({
			message: `Remove ${found.value.length} cached checkout(s), freeing ${formatSize(total)}?`,
		})
		if (isCancel(confirmed) || !confirmed) {
			printOutcome(CommandResult.cancelled())
			return
		}
	}

	const result = await pruneWorkspace(handle, { dryRun: options.dryRun })
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}

	if (result.value.dryRun) {
		printOutcome(
			CommandResult.unchanged(
				`Dry run: would remove ${result.value.unreferenced.length} cached checkout(s), freeing ${formatSize(total)}.`,
			),
		)
		return
	}
	const freed = result.value.removed.reduce((sum, checkout) => sum + checkout.sizeBytes, 0)
	consola.success(
		`Removed ${result.value.removed.length} cached checkout(s), freed ${formatSize(freed)}.`,
	)
	printOutcome(CommandResult.completed(undefined))
}
