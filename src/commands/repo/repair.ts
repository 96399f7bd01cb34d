import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { formatRepairSummary, repairRepository } from "@/repo/verify"
import { formatResourceRef } from "@/resources/ref"

export async function repoRepair(options: { dryRun: boolean }): Promise<void> {
	consola.info("airepo repo repair")

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}

	const result = await repairRepository(context.value.handle, { dryRun: options.dryRun })
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}

	const report = result.value
	const [create, remove] = report.dryRun ? ["Would create", "Would remove"] : ["Created", "Removed"]
	for (const ref of report.created) {
		consola.success(`${create} metadata for ${formatResourceRef(ref)}`)
	}
	for (const entry of report.removed) {
		consola.success(`${remove} orphaned metadata ${entry.metadataPath}`)
	}
	for (const entry of report.unfixable) {
		consola.warn(
			`Cannot fix ${formatResourceRef(entry.ref)}: missing members ${entry.missing.join(", ")}. Import them or edit the package.`,
		)
	}
	printWarnings(report.warnings)
	consola.info(formatRepairSummary(report))

	if (report.dryRun) {
		printOutcome(CommandResult.unchanged("Dry run: nothing was written."))
		return
	}
	printOutcome(CommandResult.completed(undefined))
}
