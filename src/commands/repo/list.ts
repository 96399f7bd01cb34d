import { consola } from "consola"
import { table } from "table"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome, printWarnings } from "@/commands/types"
import { listResources, type StoredResource } from "@/repo/store"
import { isResourceType } from "@/types/branded"

export interface ResourceView {
	type: string
	name: string
	description: string
	source: string | null
	source_type: string | null
	last_updated: string | null
}

export function buildResourceViews(resources: StoredResource[]): ResourceView[] {
	return resources.map(({ metadata, resource }) => ({
		description: resource.description,
		last_updated: metadata?.last_updated ?? null,
		name: resource.name,
		source: metadata ? (metadata.source_name ?? metadata.source_url) : null,
		source_type: metadata?.source_type ?? null,
		type: resource.type,
	}))
}

export async function repoList(type: string | undefined, options: { json: boolean }): Promise<void> {
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

	const listing = await listResources(context.value.handle, type)
	if (!listing.ok) {
		printOutcome(CommandResult.failed(listing.error))
		return
	}

	printWarnings(listing.value.warnings)
	const views = buildResourceViews(listing.value.resources)
	if (options.json) {
		console.log(JSON.stringify(views, null, 2))
		return
	}

	if (views.length === 0) {
		consola.info("No resources in repository.")
		return
	}

	const rows = [
		["Type", "Name", "Description", "Source"],
		...views.map((view) => [
			view.type,
			view.name,
			truncate(view.description, 60),
			view.source ?? "(no metadata)",
		]),
	]
	console.log(table(rows))
}

function truncate(value: string, max: number): string {
	return value.length > max ? `${value.slice(0, max - 3)}...` : value
}
