import { describe, expect, it } from "vitest"
import { z } from "zod"
import { formatErrorChain } from "@/commands/types"
import type { IoError, ValidationError } from "@/types/error"
import { abs } from "../../tests/helpers"

describe("formatErrorChain", () => {
	it("prints details and nested causes", () => {
		const cause: ValidationError = {
			field: "name",
			message: "Name is empty.",
			source: "manual",
			type: "validation",
		}
		const error: IoError = {
			cause,
			message: "Unable to write /repo/a.",
			operation: "write",
			path: abs("/repo/a"),
			type: "io",
		}

		expect(formatErrorChain(error).split("\n")).toEqual([
			"[io] Unable to write /repo/a. (path=/repo/a, operation=write)",
			"Caused by:",
			"  [validation] Name is empty. (field=name, source=manual)",
		])
	})

	it("lists zod issues by path", () => {
		const parsed = z.object({ name: z.string() }).safeParse({ name: 3 })
		expect(parsed.success).toBe(false)
		if (!parsed.success) {
			const error: ValidationError = {
				field: "config",
				message: "Invalid config.",
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			}

			expect(formatErrorChain(error).split("\n")).toEqual([
				"[validation] Invalid config. (field=config, source=zod)",
				"  Zod issues:",
				`  - name: ${parsed.error.issues[0]?.message}`,
			])
		}
	})
})
