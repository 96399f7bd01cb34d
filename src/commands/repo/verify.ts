import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { hasVerifyErrors, verifyRepository, type VerifyReport } from "@/repo/verify"
import { formatResourceRef } from "@/resources/ref"
import { isResourceType } from "@/types/branded"

export async function repoVerify(
	type: string | undefined,
	options: { json: boolean },
): Promise<void> {
	if (type !== undefined && !isResourceType(type)) {
		printOutcome(
			CommandResult.failed({
				field: "type",
				message: `Unknown resource type '${type}'. Expected command, skill, agent or package.`,
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

	const result = await verifyRepository(context.value.handle, type)
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}

	const report = result.value
	if (options.json) {
		console.log(JSON.stringify(report, null, 2))
	} else {
		printVerifyReport(report)
	}

	if (hasVerifyErrors(report)) {
		process.exitCode = 1
	}
}

function printVerifyReport(report: VerifyReport): void {
	printWarnings(report.warnings)
	for (const ref of report.missingMetadata) {
		consola.warn(`${formatResourceRef(ref)}: no metadata`)
	}
	for (const entry of report.missingSourcePaths) {
		consola.warn(
			`${formatResourceRef(entry.ref)}: source path ${entry.sourcePath} no longer exists`,
		)
	}
	for (const entry of report.orphanedMetadata) {
		consola.error(
			`${formatResourceRef(entry.ref)}: metadata without a resource (${entry.metadataPath})`,
		)
	}
	for (const entry of report.incompletePackages) {
		consola.error(`${formatResourceRef(entry.ref)}: missing members ${entry.missing.join(", ")}`)
	}

	const problems =
		report.missingMetadata.length +
		report.missingSourcePaths.length +
		report.orphanedMetadata.length +
		report.incompletePackages.length
	if (problems === 0) {
		consola.success("Repository is consistent.")
		return
	}
	if (report.missingMetadata.length > 0 || report.orphanedMetadata.length > 0) {
		consola.info("Run `airepo repo repair` to fix metadata issues.")
	}
}
