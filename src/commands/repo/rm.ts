import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { isInstalled } from "@/install/installer"
import { commitBestEffort } from "@/repo/git"
import { removeResource } from "@/repo/store"
import { formatResourceRef, parseResourceRef } from "@/resources/ref"
import { listTools, resolveTool } from "@/tools/registry"
import { coerceAbsolutePath } from "@/types/coerce"

export async function repoRm(value: string): Promise<void> {
	consola.info("airepo repo rm")

	const ref = parseResourceRef(value)
	if (!ref.ok) {
		printOutcome(CommandResult.failed(ref.error))
		return
	}

	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	const { handle } = context.value
	const label = formatResourceRef(ref.value)

	// Links in the current project would dangle once the resource is gone.
	const projectRoot = coerceAbsolutePath(".", process.cwd())
	if (projectRoot) {
		const tools = listTools().map((tool) => resolveTool(tool, projectRoot))
		const linked = await isInstalled(ref.value, tools)
		if (!linked.ok) {
			consola.warn(linked.error.message)
		} else if (linked.value) {
			consola.warn(
				`${label} is installed in ${projectRoot}; run \`airepo uninstall ${label}\` to remove its links.`,
			)
		}
	}

	const removed = await removeResource(handle, ref.value)
	if (!removed.ok) {
		printOutcome(CommandResult.failed(removed.error))
		return
	}

	if (!removed.value.removedMetadata) {
		consola.warn(`${label} had no metadata.`)
	}
	if (!removed.value.removedFile) {
		consola.warn(`${label} had metadata but no file.`)
	}

	const warnings: string[] = []
	await commitBestEffort(handle, `remove ${label}`, warnings)
	printWarnings(warnings)

	consola.success(`Removed ${label}.`)
	printOutcome(CommandResult.completed(undefined))
}
