import { describe, expect, it } from "vitest"
import { formatResourceRef, parseResourceRef } from "@/resources/ref"

describe("parseResourceRef", () => {
	it("parses flat references", () => {
		expect(parseResourceRef("skill/pdf-tools")).toEqual({
			ok: true,
			value: { name: "pdf-tools", type: "skill" },
		})
	})

	it("keeps nested names for commands and agents", () => {
		expect(parseResourceRef("command/api/deploy")).toEqual({
			ok: true,
			value: { name: "api/deploy", type: "command" },
		})
		expect(parseResourceRef("agent/review/security")).toEqual({
			ok: true,
			value: { name: "review/security", type: "agent" },
		})
	})

	it("rejects nested names for skills and packages", () => {
		const result = parseResourceRef("skill/docs/pdf")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.message).toBe("Invalid skill name 'docs/pdf': must not contain '/'.")
		}
	})

	it("rejects unknown types and missing names", () => {
		for (const value of ["widget/foo", "skill/", "skill", "/foo"]) {
			const result = parseResourceRef(value)
			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.field).toBe("resource")
			}
		}
	})

	it("rejects invalid name segments", () => {
		const result = parseResourceRef("command/Deploy")

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.field).toBe("name")
		}
	})
})

describe("formatResourceRef", () => {
	it("joins type and name", () => {
		const ref = parseResourceRef("command/api/deploy")
		expect(ref.ok).toBe(true)
		if (ref.ok) {
			expect(formatResourceRef(ref.value)).toBe("command/api/deploy")
		}
	})
})
