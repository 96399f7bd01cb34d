import { consola } from "consola"
import { loadContext } from "@/commands/context"
import { CommandResult, printOutcome } from "@/commands/types"
import { loadMetadata, type ResourceMetadata } from "@/repo/metadata"
import { getResource } from "@/repo/store"
import { formatResourceRef, parseResourceRef } from "@/resources/ref"
import type { Resource } from "@/resources/types"

/**
 * Detail lines for one resource, in display order.
 */
export function describeResource(resource: Resource, metadata: ResourceMetadata | null): string[] {
	const lines = [
		`Resource: ${formatResourceRef(resource)}`,
		`Description: ${resource.description}`,
		`Path: ${resource.path}`,
	]
	switch (resource.type) {
		case "command":
			if (resource.agent) {
				lines.push(`Agent: ${resource.agent}`)
			}
			if (resource.model) {
				lines.push(`Model: ${resource.model}`)
			}
			if (resource.allowedTools.length > 0) {
				lines.push(`Allowed tools: ${resource.allowedTools.join(", ")}`)
			}
			break
		case "agent":
			if (resource.model) {
				lines.push(`Model: ${resource.model}`)
			}
			if (resource.tools.length > 0) {
				lines.push(`Tools: ${resource.tools.join(", ")}`)
			}
			break
		case "package":
			lines.push(`Members: ${resource.resources.map(formatResourceRef).join(", ")}`)
			break
		case "skill":
			break
	}
	if (resource.version) {
		lines.push(`Version: ${resource.version}`)
	}
	if (resource.license) {
		lines.push(`License: ${resource.license}`)
	}

	if (!metadata) {
		lines.push("Metadata: none (orphaned file)")
		return lines
	}
	lines.push(`Source: ${metadata.source_name ?? "(none)"} [${metadata.source_type}]`)
	lines.push(`Source URL: ${metadata.source_url}`)
	if (metadata.ref) {
		lines.push(`Ref: ${metadata.ref}`)
	}
	lines.push(`First installed: ${metadata.first_installed}`)
	lines.push(`Last updated: ${metadata.last_updated}`)
	return lines
}

export async function repoShow(value: string): Promise<void> {
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

	const resource = await getResource(handle, ref.value)
	if (!resource.ok) {
		printOutcome(CommandResult.failed(resource.error))
		return
	}
	const metadata = await loadMetadata(handle, ref.value.type, ref.value.name)
	if (!metadata.ok) {
		consola.warn(metadata.error.message)
	}

	consola.log(describeResource(resource.value, metadata.ok ? metadata.value : null).join("\n"))
}
