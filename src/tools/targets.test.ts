import { mkdir } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { parseTargets, resolveTargets } from "@/tools/targets"
import { abs, withTempDir } from "../../tests/helpers"

describe("resolveTargets", () => {
	it("uses explicit targets first", async () => {
		await withTempDir(async (dir) => {
			await mkdir(join(dir, ".claude"))

			const result = await resolveTargets({
				defaults: ["claude"],
				explicit: ["opencode"],
				manifestTargets: ["copilot"],
				projectRoot: abs(dir),
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.origin).toBe("explicit")
				expect(result.value.tools.map((tool) => tool.id)).toEqual(["opencode"])
			}
		})
	})

	it("uses detected tools before the project manifest", async () => {
		await withTempDir(async (dir) => {
			await mkdir(join(dir, ".opencode"))

			const result = await resolveTargets({
				defaults: ["claude"],
				manifestTargets: ["copilot"],
				projectRoot: abs(dir),
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.origin).toBe("detected")
				expect(result.value.tools.map((tool) => tool.id)).toEqual(["opencode"])
			}
		})
	})

	it("uses manifest targets before defaults", async () => {
		await withTempDir(async (dir) => {
			const result = await resolveTargets({
				defaults: ["claude"],
				manifestTargets: ["copilot"],
				projectRoot: abs(dir),
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.origin).toBe("manifest")
				expect(result.value.tools.map((tool) => tool.id)).toEqual(["copilot"])
			}
		})
	})

	it("falls back to the defaults", async () => {
		await withTempDir(async (dir) => {
			const result = await resolveTargets({
				defaults: ["claude"],
				explicit: [],
				manifestTargets: [],
				projectRoot: abs(dir),
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.origin).toBe("default")
				expect(result.value.tools.map((tool) => tool.id)).toEqual(["claude"])
			}
		})
	})
})

describe("parseTargets", () => {
	it("collapses aliases onto one tool", () => {
		const result = parseTargets(["copilot", "vscode", "claude"], "explicit")

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.tools.map((tool) => tool.id)).toEqual(["copilot", "claude"])
		}
	})

	it("fails on the first unknown name", () => {
		const result = parseTargets(["claude", "nano"], "explicit")

		expect(result.ok).toBe(false)
	})
})
