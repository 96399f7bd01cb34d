import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { resolveProjectTargets, type TargetFlags } from "@/commands/targets"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { uninstallResource } from "@/install/installer"
import { formatResourceRef, parseResourceRef } from "@/resources/ref"
import { removeProjectResource, saveProjectManifest } from "@/tools/project"

export async function uninstall(values: string[], options: TargetFlags): Promise<void> {
	consola.info("airepo uninstall")

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}

	const targets = await resolveProjectTargets(options, context.value.config, process.cwd())
	if (targets.status !== "completed") {
		printOutcome(targets)
		return
	}
	const { manifest, projectRoot, tools } = targets.value

	let removed = 0
	let skipped = 0
	let failed = 0
	let nextManifest = manifest
	for (const value of values) {
		const ref = parseResourceRef(value)
		if (!ref.ok) {
			consola.error(ref.error.message)
			failed += 1
			continue
		}
		const label = formatResourceRef(ref.value)

		const result = await uninstallResource(ref.value, tools)
		if (!result.ok) {
			if (result.error.type === "io") {
				printOutcome(CommandResult.failed(result.error))
				return
			}
			if (result.error.type === "not_found") {
				printWarnings(result.error.warnings)
				consola.info(`${label}: not installed`)
				skipped += 1
			} else {
				consola.error(`${label}: ${result.error.message}`)
				failed += 1
			}
			continue
		}

		printWarnings(result.value.warnings)
		consola.success(`${label}: removed from ${result.value.removedFrom.join(", ")}`)
		removed += 1
		if (nextManifest) {
			nextManifest = removeProjectResource(nextManifest, label)
		}
	}

	if (manifest && nextManifest && nextManifest.resources.length !== manifest.resources.length) {
		const saved = await saveProjectManifest(projectRoot, nextManifest)
		if (!saved.ok) {
			printOutcome(CommandResult.failed(saved.error))
			return
		}
		consola.info("Updated ai.package.yaml.")
	}

	consola.info(`${removed} removed, ${skipped} skipped, ${failed} failed`)
	if (failed > 0) {
		process.exitCode = 1
		return
	}
	printOutcome(CommandResult.completed(undefined))
}
