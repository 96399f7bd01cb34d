import { consola } from "consola"
import { table } from "table"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome } from "@/commands/types"
import { loadSourceManifest, type SourceManifest, sourceLocation } from "@/sources/manifest"
import { getStateEntry, loadSourceState, type SourceState } from "@/sources/state"

export interface SourceView {
	id: string
	name: string
	location: string
	ref?: string
	subpath?: string
	mode: string
	added?: string
	last_synced?: string
}

/**
 * Manifest entries joined with their recorded times. The state store wins;
 * times written into the manifest fill the gaps.
 */
export function buildSourceViews(manifest: SourceManifest, state: SourceState): SourceView[] {
	return manifest.sources.map((source) => {
		const entry = getStateEntry(state, source.name)
		const location = sourceLocation(source)
		return {
			added: entry?.added ?? source.added,
			id: source.id,
			last_synced: entry?.last_synced ?? source.last_synced,
			location: "url" in location ? location.url : location.path,
			mode: source.mode,
			name: source.name,
			ref: source.ref,
			subpath: source.subpath,
		}
	})
}

export async function repoSources(options: { json: boolean }): Promise<void> {
	const context = await loadContext()
	if (context.status !== "completed") {
		printOutcome(context)
		return
	}
	const { handle } = context.value

	const manifest = await loadSourceManifest(handle)
	if (!manifest.ok) {
		printOutcome(CommandResult.failed(manifest.error))
		return
	}
	const state = await loadSourceState(handle)
	if (!state.ok) {
		printOutcome(CommandResult.failed(state.error))
		return
	}

	const views = buildSourceViews(manifest.value, state.value)
	if (options.json) {
		console.log(JSON.stringify(views, null, 2))
		return
	}

	if (views.length === 0) {
		consola.info("No sources configured.")
		return
	}

	const rows = [
		["Name", "Location", "Ref", "Mode", "Added", "Last synced"],
		...views.map((view) => [
			view.name,
			view.subpath ? `${view.location} (${view.subpath})` : view.location,
			view.ref ?? "",
			view.mode,
			view.added ?? "",
			view.last_synced ?? "never",
		]),
	]
	console.log(table(rows))
}
