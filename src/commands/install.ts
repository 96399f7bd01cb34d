import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { resolveProjectTargets, type TargetFlags } from "@/commands/targets"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { formatInstallSummary, installResources } from "@/install/installer"
import type { InstallReport } from "@/install/types"
import { formatResourceRef, parseResourceRef } from "@/resources/ref"
import type { ResourceRef } from "@/resources/types"
import { addProjectResource, saveProjectManifest } from "@/tools/project"

export async function install(values: string[], options: TargetFlags): Promise<void> {
	consola.info("airepo install")

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	const { config, handle } = context.value

	const targets = await resolveProjectTargets(options, config, process.cwd())
	if (targets.status !== "completed") {
		printOutcome(targets)
		return
	}
	const { manifest, origin, projectRoot, tools } = targets.value

	const requested = values.length > 0 ? values : (manifest?.resources ?? [])
	if (requested.length === 0) {
		printOutcome(
			CommandResult.unchanged("Nothing to install. Name resources or list them in ai.package.yaml."),
		)
		return
	}

	const refs: ResourceRef[] = []
	for (const value of requested) {
		const ref = parseResourceRef(value)
		if (!ref.ok) {
			printOutcome(CommandResult.failed(ref.error))
			return
		}
		refs.push(ref.value)
	}

	consola.start(
		`Installing into ${tools.map((tool) => tool.displayName).join(", ")} (${origin} targets)...`,
	)

	const result = await installResources(handle, refs, tools)
	if (!result.ok) {
		printOutcome(CommandResult.failed(result.error))
		return
	}
	printInstallReport(result.value)

	if (manifest && values.length > 0) {
		const failed = new Set(result.value.failed.map((failure) => formatResourceRef(failure.ref)))
		const updated = refs
			.map(formatResourceRef)
			.filter((ref) => !failed.has(ref))
			.reduce(addProjectResource, manifest)
		if (updated !== manifest) {
			const saved = await saveProjectManifest(projectRoot, updated)
			if (!saved.ok) {
				printOutcome(CommandResult.failed(saved.error))
				return
			}
			consola.info("Updated ai.package.yaml.")
		}
	}

	if (result.value.failed.length > 0) {
		process.exitCode = 1
		return
	}
	printOutcome(CommandResult.completed(undefined))
}

function printInstallReport(report: InstallReport): void {
	for (const entry of report.installed) {
		for (const link of entry.links) {
			consola.success(`${formatResourceRef(entry.ref)} -> ${link.tool}: ${link.status}`)
		}
	}
	for (const failure of report.failed) {
		consola.error(`${formatResourceRef(failure.ref)}: ${failure.message}`)
	}
	printWarnings(report.warnings)
	consola.info(formatInstallSummary(report))
}
