import { validateResourceName } from "@/resources/name"
import type { ResourceRef } from "@/resources/types"
import { isResourceType, type ResourceType } from "@/types/branded"
import type { Result, ValidationError } from "@/types/error"

const NESTED_TYPES: ReadonlySet<ResourceType> = new Set(["command", "agent"])

/**
 * Parse a "type/name" reference such as "skill/pdf-tools" or "command/api/deploy".
 */
export function parseResourceRef(value: string): Result<ResourceRef, ValidationError> {
	const trimmed = value.trim()
	const slash = trimmed.indexOf("/")
	const type = slash > 0 ? trimmed.slice(0, slash) : ""
	const name = slash > 0 ? trimmed.slice(slash + 1) : ""

	if (!isResourceType(type) || !name) {
		return {
			error: {
				field: "resource",
				message: `Invalid resource reference '${value}': expected type/name where type is command, skill, agent or package.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const validated = validateResourceName(name, type, NESTED_TYPES.has(type))
	if (!validated.ok) {
		return validated
	}

	return { ok: true, value: { name: validated.value, type } }
}

export function formatResourceRef(ref: ResourceRef): string {
	return `${ref.type}/${ref.name}`
}
