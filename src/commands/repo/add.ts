import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { printImportReport } from "@/commands/repo/report"
import { CommandResult, printOutcome } from "@/commands/types"
import { formatDiscoveryCounts } from "@/discovery"
import { addSourceAndImport } from "@/sources/operations"

export interface RepoAddOptions {
	name?: string
	ref?: string
	subpath?: string
	force: boolean
	skipExisting: boolean
	dryRun: boolean
}

export async function repoAdd(location: string, options: RepoAddOptions): Promise<void> {
	consola.info("airepo repo add")

	if (options.force && options.skipExisting) {
		printOutcome(
			CommandResult.failed({
				field: "force",
				message: "--force and --skip-existing cannot be used together.",
				source: "manual",
				type: "validation",
			}),
		)
		return
	}

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	const { handle } = context.value

	consola.start(options.dryRun ? `Planning import from ${location}...` : `Adding ${location}...`)

	const result = await addSourceAndImport(
		handle,
		{ location, name: options.name, ref: options.ref, subpath: options.subpath },
		{ dryRun: options.dryRun, force: options.force, skipExisting: options.skipExisting },
	)
	if (!result.ok) {
		if ("report" in result.error) {
			printImportReport(result.error.report)
		}
		printOutcome(CommandResult.failed(result.error))
		return
	}

	const { discovered, report, source } = result.value
	consola.info(`Source: ${source.name} (${source.id})`)
	consola.info(`Discovered ${formatDiscoveryCounts(discovered)}.`)
	for (const issue of discovered.issues) {
		consola.warn(`${issue.path}: ${issue.message}`)
	}
	printImportReport(report)

	if (options.dryRun) {
		printOutcome(CommandResult.unchanged("Dry run: nothing was written."))
		return
	}
	printOutcome(CommandResult.completed(undefined))
}
