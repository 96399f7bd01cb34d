import { consola } from "consola"
import { printWarnings } from "@/commands/types"
import { formatImportSummary, type ImportReport } from "@/repo/import"
import { formatResourceRef } from "@/resources/ref"

export function printImportReport(report: ImportReport): void {
	const verb = report.dryRun ? "Would add" : "Added"
	for (const entry of report.added) {
		const suffix = entry.replaced ? " (replaced)" : ""
		consola.success(`${verb} ${formatResourceRef(entry.ref)}${suffix}`)
	}
	for (const ref of report.skipped) {
		consola.info(`Skipped ${formatResourceRef(ref)} (already exists)`)
	}
	for (const failure of report.failed) {
		consola.error(`Failed ${failure.path}: ${failure.message}`)
	}
	printWarnings(report.warnings)
	consola.info(formatImportSummary(report))
}
