import path from "node:path"
import { z } from "zod"
import { readTextFile, safeStat } from "@/io/fs"
import {
	CommonFieldsSchema,
	LooseStringSchema,
	parseFrontmatter,
	toNonEmpty,
	validateFields,
} from "@/resources/frontmatter"
import { validateResourceName } from "@/resources/name"
import type { LoadResult, ResourceKind } from "@/resources/types"
import type { AbsolutePath, ResourceName } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

export const SKILL_FILENAME = "SKILL.md"
export const MAX_SKILL_DESCRIPTION_LENGTH = 1024

const SkillFrontmatterSchema = CommonFieldsSchema.extend({
	description: z
		.string()
		.trim()
		.min(1)
		.max(MAX_SKILL_DESCRIPTION_LENGTH)
		.transform(toNonEmpty),
	name: LooseStringSchema.optional(),
})

export async function loadSkill(dirPath: AbsolutePath): Promise<LoadResult<"skill">> {
	const stats = await safeStat(dirPath)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return {
			error: {
				message: `Skill directory does not exist: ${dirPath}`,
				path: dirPath,
				target: "skill",
				type: "not_found",
			},
			ok: false,
		}
	}
	if (!stats.value.isDirectory()) {
		return {
			error: {
				field: "path",
				message: `A skill must be a directory: ${dirPath}`,
				path: dirPath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const skillFile = joinAbsolute(dirPath, SKILL_FILENAME)
	const skillStats = await safeStat(skillFile)
	if (!skillStats.ok) {
		return skillStats
	}
	if (!skillStats.value?.isFile()) {
		return {
			error: {
				field: "path",
				message: `Skill directory is missing ${SKILL_FILENAME}: ${dirPath}`,
				path: dirPath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const contents = await readTextFile(skillFile)
	if (!contents.ok) {
		return contents
	}

	const frontmatter = parseFrontmatter(contents.value, skillFile)
	if (!frontmatter.ok) {
		return frontmatter
	}

	const fields = validateFields(SkillFrontmatterSchema, frontmatter.value.data, skillFile)
	if (!fields.ok) {
		return fields
	}

	const dirName = path.basename(dirPath)
	const declared = fields.value.name || dirName
	if (declared !== dirName) {
		return {
			error: {
				field: "name",
				message: `Skill name '${declared}' must match its directory name '${dirName}'.`,
				path: skillFile,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const name = validateResourceName(declared, "skill", false, skillFile)
	if (!name.ok) {
		return name
	}

	return {
		ok: true,
		value: {
			author: fields.value.author,
			description: fields.value.description,
			license: fields.value.license,
			name: name.value,
			path: dirPath,
			type: "skill",
			version: fields.value.version,
		},
	}
}

export async function isSkillDir(dirPath: string): Promise<boolean> {
	const stats = await safeStat(path.join(dirPath, SKILL_FILENAME))
	return stats.ok && stats.value !== null && stats.value.isFile()
}

export const skillKind: ResourceKind<"skill"> = {
	allowNested: false,
	dirName: "skills",
	entry: "dir",
	linkName: (name: ResourceName) => name,
	load: (dirPath: AbsolutePath) => loadSkill(dirPath),
	storagePath: (typeDir: AbsolutePath, name: ResourceName) => joinAbsolute(typeDir, name),
	type: "skill",
}
