import { confirm, isCancel } from "@clack/prompts"
import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome } from "@/commands/types"
import { cleanInstalled } from "@/install/installer"
import { detectExistingTools, resolveTool } from "@/tools/registry"
import { coerceAbsolutePath } from "@/types/coerce"

export interface CleanCommandOptions {
	project?: string
	dryRun: boolean
	yes: boolean
}

/**
 * Removes links from every tool whose directory exists in the project.
 */
export async function clean(options: CleanCommandOptions): Promise<void> {
	consola.info("airepo clean")

	const projectRoot = coerceAbsolutePath(options.project ?? ".", process.cwd())
	if (!projectRoot) {
		printOutcome(
			CommandResult.failed({
				field: "project",
				message: `Invalid project directory '${options.project ?? ""}'.`,
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

	const detected = await detectExistingTools(projectRoot)
	if (!detected.ok) {
		printOutcome(CommandResult.failed(detected.error))
		return
	}
	if (detected.value.length === 0) {
		printOutcome(CommandResult.unchanged("No tool directories found in this project."))
		return
	}
	const tools = detected.value.map((tool) => resolveTool(tool, projectRoot))

	const planned = await cleanInstalled(handle, tools, { dryRun: true })
	if (!planned.ok) {
		printOutcome(CommandResult.failed(planned.error))
		return
	}
	if (planned.value.length === 0) {
		printOutcome(CommandResult.unchanged("No installed resources to remove."))
		return
	}
	for (const link of planned.value) {
		consola.info(`${link.type}/${link.name} in ${link.tool} (${link.linkPath})`)
	}

	if (options.dryRun) {
		printOutcome(
			CommandResult.unchanged(`Dry run: would remove ${planned.value.length} link(s).`),
		)
		return
	}

	if (!options.yes) {
		const confirmed = await confirm({ message: `Remove ${planned.value.length} link(s)?` })
		if (isCancel(confirmed) || !confirmed) {
			printOutcome(CommandResult.cancelled())
			return
		}
	}

	const removed = await cleanInstalled(handle, tools)
	if (!removed.ok) {
		printOutcome(CommandResult.failed(removed.error))
		return
	}
	consola.success(`Removed ${removed.value.length} link(s).`)
	consola.info("Run `airepo install` to restore the resources listed in ai.package.yaml.")
	printOutcome(CommandResult.completed(undefined))
}
