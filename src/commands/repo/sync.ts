import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { formatImportSummary } from "@/repo/import"
import { formatResourceRef } from "@/resources/ref"
import { formatSyncSummary, runSync } from "@/sync/sync"
import type { SyncSummary } from "@/sync/types"

export interface RepoSyncOptions {
	skipExisting: boolean
	dryRun: boolean
	prune: boolean
}

export async function repoSync(options: RepoSyncOptions): Promise<void> {
	consola.info("airepo repo sync")

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	const { handle } = context.value

	consola.start(options.dryRun ? "Planning sync..." : "Syncing sources...")

	const result = await runSync(handle, {
		dryRun: options.dryRun,
		prune: options.prune,
		skipExisting: options.skipExisting,
	})
	if (!result.ok) {
		if ("summary" in result.error) {
			printSyncSummary(result.error.summary)
		}
		printOutcome(CommandResult.failed(result.error))
		return
	}

	const summary = result.value
	if (summary.sources.length === 0) {
		printOutcome(CommandResult.unchanged("No sources configured. Use `airepo repo add` first."))
		return
	}

	printSyncSummary(summary)
	if (summary.dryRun) {
		printOutcome(CommandResult.unchanged("Dry run: nothing was written."))
		return
	}
	printOutcome(CommandResult.completed(undefined))
}

function printSyncSummary(summary: SyncSummary): void {
	for (const result of summary.sources) {
		if (result.status === "failed") {
			consola.error(
				`${result.source}: failed during ${result.failure.stage}: ${result.failure.message}`,
			)
			continue
		}
		consola.success(`${result.source}: ${formatImportSummary(result.import)}`)
	}

	const removed = new Set(summary.removed.map(formatResourceRef))
	for (const orphan of summary.orphans) {
		const ref = formatResourceRef(orphan.ref)
		const action = removed.has(ref) ? "removed" : "orphaned"
		consola.warn(`${ref} is no longer provided by '${orphan.source}' (${action})`)
	}

	printWarnings(summary.warnings)
	consola.info(formatSyncSummary(summary))
}
