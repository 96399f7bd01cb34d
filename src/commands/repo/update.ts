import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { formatResourceRef, parseResourceRef } from "@/resources/ref"
import type { ResourceRef } from "@/resources/types"
import { formatUpdateSummary, updateResources } from "@/sync/update"

export interface RepoUpdateOptions {
	dryRun: boolean
}

export async function repoUpdate(values: string[], options: RepoUpdateOptions): Promise<void> {
	consola.info("airepo repo update")

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	const { handle } = context.value

	let refs: ResourceRef[] | undefined
	if (values.length > 0) {
		refs = []
		for (const value of values) {
			const ref = parseResourceRef(value)
			if (!ref.ok) {
				printOutcome(CommandResult.failed(ref.error))
				return
			}
			refs.push(ref.value)
		}
	}

	consola.start(options.dryRun ? "Planning update..." : "Updating resources...")

	const result = await updateResources(handle, refs, { dryRun: options.dryRun })
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}

	const summary = result.value
	if (summary.results.length === 0) {
		printOutcome(CommandResult.unchanged("Nothing to update."))
		return
	}

	for (const entry of summary.results) {
		const label = formatResourceRef(entry.ref)
		switch (entry.status) {
			case "updated":
				consola.success(
					`${label}: ${summary.dryRun ? "would update" : "updated"} from ${entry.origin}`,
				)
				break
			case "skipped":
				consola.warn(`${label}: skipped, ${entry.message}`)
				break
			case "failed":
				consola.error(`${label}: ${entry.message}`)
				break
		}
	}
	printWarnings(summary.warnings)
	consola.info(formatUpdateSummary(summary))

	const reasons = new Set(
		summary.results.flatMap((entry) => (entry.status === "skipped" ? [entry.reason] : [])),
	)
	if (reasons.has("source_unavailable")) {
		consola.info(
			"Hint: run `airepo repo verify` to list resources whose source is gone, then `airepo repo rm` or `airepo repo remove` to drop them.",
		)
	}
	if (reasons.has("no_metadata")) {
		consola.info("Hint: run `airepo repo repair` to record metadata for resources without it.")
	}

	if (summary.failed > 0) {
		process.exitCode = 1
		return
	}
	if (summary.dryRun) {
		printOutcome(CommandResult.unchanged("Dry run: nothing was written."))
		return
	}
	printOutcome(CommandResult.completed(undefined))
}
