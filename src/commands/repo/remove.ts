import { confirm, isCancel } from "@clack/prompts"
import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { formatResourceRef } from "@/resources/ref"
import { getSource, loadSourceManifest } from "@/sources/manifest"
import { removeSourceAndResources } from "@/sources/operations"

export interface RepoRemoveOptions {
	keepResources: boolean
	dryRun: boolean
	yes: boolean
}

export async function repoRemove(key: string, options: RepoRemoveOptions): Promise<void> {
	consola.info("airepo repo remove")

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	const { handle } = context.value

	if (!options.dryRun && !options.yes) {
		const manifest = await loadSourceManifest(handle)
		if (!manifest.ok) {
			printOutcome(CommandResult.failed(manifest.error))
			return
		}
		const source = getSource(manifest.value, key)
		if (source) {
			const message = options.keepResources
				? `Remove source '${source.name}' and keep its resources?`
				: `Remove source '${source.name}' and every resource imported from it?`
			const confirmed = await confirm({ message })
			if (isCancel(confirmed) || !confirmed) {
				printOutcome(CommandResult.cancelled())
				return
			}
		}
	}

	const result = await removeSourceAndResources(handle, key, {
		dryRun: options.dryRun,
		keepResources: options.keepResources,
	})
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}

	const { dryRun, removed, source, warnings } = result.value
	const verb = dryRun ? "Would remove" : "Removed"
	for (const ref of removed) {
		consola.success(`${verb} ${formatResourceRef(ref)}`)
	}
	printWarnings(warnings)
	consola.info(`${verb} source '${source.name}' and ${removed.length} resource(s).`)

	if (dryRun) {
		printOutcome(CommandResult.unchanged("Dry run: nothing was written."))
		return
	}
	printOutcome(CommandResult.completed(undefined))
}
