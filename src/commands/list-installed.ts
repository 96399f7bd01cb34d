import { consola } from "consola"
import { table } from "table"
import type { TargetFlags } from "@/commands/targets"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { listInstalled } from "@/install/installer"
import { listTools, resolveTool } from "@/tools/registry"
import { parseTargets } from "@/tools/targets"
import { coerceAbsolutePath } from "@/types/coerce"

/**
 * Lists across every known tool unless targets are named.
 */
export async function listInstalledCommand(
	options: TargetFlags & { json: boolean },
): Promise<void> {
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

	let definitions = listTools()
	if (options.target && options.target.length > 0) {
		const parsed = parseTargets(options.target, "explicit")
		if (!parsed.ok) {
			printOutcome(CommandResult.failed(parsed.error))
			return
		}
		definitions = parsed.value.tools
	}

	const listing = await listInstalled(definitions.map((tool) => resolveTool(tool, projectRoot)))
	if (!listing.ok) {
		printOutcome(CommandResult.failed(listing.error))
		return
	}

	printWarnings(listing.value.warnings)
	const { entries } = listing.value
	if (options.json) {
		console.log(JSON.stringify(entries, null, 2))
		return
	}

	if (entries.length === 0) {
		consola.info("Nothing installed.")
		return
	}

	const rows = [
		["Type", "Name", "Tools", "Health", "Path"],
		...entries.map((entry) => [
			entry.type,
			entry.name,
			entry.tools.join(", "),
			entry.health,
			entry.path,
		]),
	]
	console.log(table(rows))
}
