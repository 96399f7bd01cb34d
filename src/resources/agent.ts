import {
	CommonFieldsSchema,
	LooseStringSchema,
	NonEmptyStringSchema,
	ToolListSchema,
	validateFields,
} from "@/resources/frontmatter"
import { MARKDOWN_EXTENSION, readMarkdownResource } from "@/resources/markdown"
import { deriveNestedName, validateResourceName } from "@/resources/name"
import type { LoadOptions, LoadResult, ResourceKind } from "@/resources/types"
import type { AbsolutePath, ResourceName } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

const AgentFrontmatterSchema = CommonFieldsSchema.extend({
	description: NonEmptyStringSchema,
	model: LooseStringSchema.optional(),
	tools: ToolListSchema,
})

export async function loadAgent(
	filePath: AbsolutePath,
	options: LoadOptions = {},
): Promise<LoadResult<"agent">> {
	const frontmatter = await readMarkdownResource(filePath, "agent")
	if (!frontmatter.ok) {
		return frontmatter
	}

	const fields = validateFields(AgentFrontmatterSchema, frontmatter.value.data, filePath)
	if (!fields.ok) {
		return fields
	}

	const rawName = deriveNestedName(filePath, MARKDOWN_EXTENSION, "agents", options.baseDir)
	const name = validateResourceName(rawName, "agent", true, filePath)
	if (!name.ok) {
		return name
	}

	return {
		ok: true,
		value: {
			author: fields.value.author,
			description: fields.value.description,
			license: fields.value.license,
			model: fields.value.model,
			name: name.value,
			path: filePath,
			tools: fields.value.tools,
			type: "agent",
			version: fields.value.version,
		},
	}
}

export const agentKind: ResourceKind<"agent"> = {
	allowNested: true,
	dirName: "agents",
	entry: "file",
	linkName: (name: ResourceName) => `${name}${MARKDOWN_EXTENSION}`,
	load: loadAgent,
	storagePath: (typeDir: AbsolutePath, name: ResourceName) =>
		joinAbsolute(typeDir, `${name}${MARKDOWN_EXTENSION}`),
	type: "agent",
}
