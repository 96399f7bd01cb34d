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

const CommandFrontmatterSchema = CommonFieldsSchema.extend({
	agent: LooseStringSchema.optional(),
	"allowed-tools": ToolListSchema,
	description: NonEmptyStringSchema,
	model: LooseStringSchema.optional(),
})

export async function loadCommand(
	filePath: AbsolutePath,
	options: LoadOptions = {},
): Promise<LoadResult<"command">> {
	const frontmatter = await readMarkdownResource(filePath, "command")
	if (!frontmatter.ok) {
		return frontmatter
	}

	const fields = validateFields(CommandFrontmatterSchema, frontmatter.value.data, filePath)
	if (!fields.ok) {
		return fields
	}

	const rawName = deriveNestedName(filePath, MARKDOWN_EXTENSION, "commands", options.baseDir)
	const name = validateResourceName(rawName, "command", true, filePath)
	if (!name.ok) {
		return name
	}

	return {
		ok: true,
		value: {
			agent: fields.value.agent,
			allowedTools: fields.value["allowed-tools"],
			author: fields.value.author,
			description: fields.value.description,
			license: fields.value.license,
			model: fields.value.model,
			name: name.value,
			path: filePath,
			type: "command",
			version: fields.value.version,
		},
	}
}

export const commandKind: ResourceKind<"command"> = {
	allowNested: true,
	dirName: "commands",
	entry: "file",
	linkName: (name: ResourceName) => `${name}${MARKDOWN_EXTENSION}`,
	load: loadCommand,
	storagePath: (typeDir: AbsolutePath, name: ResourceName) =>
		joinAbsolute(typeDir, `${name}${MARKDOWN_EXTENSION}`),
	type: "command",
}
