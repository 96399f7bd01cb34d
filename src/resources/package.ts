import { z } from "zod"
import { readTextFile, safeStat } from "@/io/fs"
import { isRecord, NonEmptyStringSchema, validateFields } from "@/resources/frontmatter"
import { validateResourceName } from "@/resources/name"
import { parseResourceRef } from "@/resources/ref"
import type { LoadResult, MemberRef, ResourceKind } from "@/resources/types"
import type { AbsolutePath, ResourceName } from "@/types/branded"
import { joinAbsolute } from "@/types/coerce"

export const PACKAGE_EXTENSION = ".package.json"

const PackageFileSchema = z.object({
	description: NonEmptyStringSchema,
	name: NonEmptyStringSchema,
	resources: z.array(z.string()).default([]),
})

export async function loadPackage(filePath: AbsolutePath): Promise<LoadResult<"package">> {
	if (!filePath.endsWith(PACKAGE_EXTENSION)) {
		return {
			error: {
				field: "path",
				message: `A package must be a ${PACKAGE_EXTENSION} file: ${filePath}`,
				path: filePath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const stats = await safeStat(filePath)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return {
			error: {
				message: `File does not exist: ${filePath}`,
				path: filePath,
				target: "package",
				type: "not_found",
			},
			ok: false,
		}
	}

	const contents = await readTextFile(filePath)
	if (!contents.ok) {
		return contents
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(contents.value)
	} catch (error) {
		return {
			error: {
				message: `Invalid JSON in ${filePath}.`,
				path: filePath,
				rawError: error instanceof Error ? error : undefined,
				source: "package",
				type: "parse",
			},
			ok: false,
		}
	}

	if (!isRecord(parsed)) {
		return {
			error: {
				field: "package",
				message: `Package file must be a JSON object: ${filePath}`,
				path: filePath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const fields = validateFields(PackageFileSchema, parsed, filePath, "package")
	if (!fields.ok) {
		return fields
	}

	const name = validateResourceName(fields.value.name, "package", false, filePath)
	if (!name.ok) {
		return name
	}

	const members: MemberRef[] = []
	for (const entry of fields.value.resources) {
		const ref = parseResourceRef(entry)
		if (!ref.ok) {
			return { error: { ...ref.error, path: filePath }, ok: false }
		}
		if (ref.value.type === "package") {
			return {
				error: {
					field: "resources",
					message: `Package '${name.value}' cannot reference another package (${entry}).`,
					path: filePath,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}
		members.push({ name: ref.value.name, type: ref.value.type })
	}

	return {
		ok: true,
		value: {
			description: fields.value.description,
			name: name.value,
			path: filePath,
			resources: members,
			type: "package",
		},
	}
}

export const packageKind: ResourceKind<"package"> = {
	allowNested: false,
	dirName: "packages",
	entry: "file",
	linkName: (name: ResourceName) => `${name}${PACKAGE_EXTENSION}`,
	load: (filePath: AbsolutePath) => loadPackage(filePath),
	storagePath: (typeDir: AbsolutePath, name: ResourceName) =>
		joinAbsolute(typeDir, `${name}${PACKAGE_EXTENSION}`),
	type: "package",
}
