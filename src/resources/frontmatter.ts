import matter from "gray-matter"
import { z } from "zod"
import type { AbsolutePath, NonEmptyString } from "@/types/branded"
import { coerceNonEmpty } from "@/types/coerce"
import type { ParseError, Result, ValidationError } from "@/types/error"

export interface Frontmatter {
	data: Record<string, unknown>
	body: string
}

export type FrontmatterError = ValidationError | ParseError

export function toNonEmpty(value: string, ctx: z.RefinementCtx): NonEmptyString {
	const coerced = coerceNonEmpty(value)
	if (coerced === null) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must not be empty" })
		return z.NEVER
	}
	return coerced
}

export const NonEmptyStringSchema = z.string().trim().min(1).transform(toNonEmpty)

// YAML turns `version: 1.0` into a number; keep it as written.
export const LooseStringSchema = z
	.union([z.string(), z.number()])
	.transform((value) => String(value).trim())

// Tool lists appear both as YAML sequences and as comma-separated strings.
export const ToolListSchema = z
	.union([z.string(), z.array(z.string())])
	.optional()
	.transform((value) => {
		if (value === undefined) return []
		const entries = typeof value === "string" ? value.split(",") : value
		return entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0)
	})

export const CommonFieldsSchema = z.object({
	author: LooseStringSchema.optional(),
	license: LooseStringSchema.optional(),
	version: LooseStringSchema.optional(),
})

export function parseFrontmatter(
	contents: string,
	filePath: AbsolutePath,
): Result<Frontmatter, FrontmatterError> {
	const normalized = contents.replace(/\r\n/g, "\n")
	if (!normalized.startsWith("---\n")) {
		return {
			error: {
				field: "frontmatter",
				message: `${filePath} must start with YAML frontmatter.`,
				path: filePath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const closingIndex = normalized.indexOf("\n---", 3)
	if (closingIndex === -1) {
		return {
			error: {
				field: "frontmatter",
				message: "Frontmatter is missing a closing --- line.",
				path: filePath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	let parsed: matter.GrayMatterFile<string>
	try {
		parsed = matter(normalized)
	} catch (error) {
		return {
			error: {
				message: `Invalid frontmatter in ${filePath}.`,
				path: filePath,
				rawError: error instanceof Error ? error : undefined,
				source: "frontmatter",
				type: "parse",
			},
			ok: false,
		}
	}

	const data: unknown = parsed.data
	if (!isRecord(data)) {
		return {
			error: {
				field: "frontmatter",
				message: "Frontmatter must be a key/value map.",
				path: filePath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return { ok: true, value: { body: parsed.content, data } }
}

/**
 * Validate parsed fields against a kind-specific schema.
 */
export function validateFields<T extends z.ZodTypeAny>(
	schema: T,
	data: Record<string, unknown>,
	filePath: AbsolutePath,
	field = "frontmatter",
): Result<z.output<T>, ValidationError> {
	const result = schema.safeParse(data)
	if (!result.success) {
		const fields = result.error.issues.map((issue) => issue.path.join(".")).join(", ")
		return {
			error: {
				field,
				message: `Invalid ${field} in ${filePath} (${fields || "root"}).`,
				path: filePath,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: result.data }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}
