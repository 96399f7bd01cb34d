import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { loadAgent } from "@/resources/agent"
import { loadCommand } from "@/resources/command"
import { loadPackage } from "@/resources/package"
import { loadSkill } from "@/resources/skill"
import {
	abs,
	markdown,
	withTempDir,
	writeAgent,
	writeCommand,
	writeFileDeep,
	writePackage,
	writeSkill,
} from "../../tests/helpers"

describe("loadCommand", () => {
	it("names a command by its path under commands/", async () => {
		await withTempDir(async (dir) => {
			const file = await writeCommand(dir, "api/deploy", "Deploy the API")

			const result = await loadCommand(abs(file))

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.name).toBe("api/deploy")
				expect(result.value.description).toBe("Deploy the API")
				expect(result.value.allowedTools).toEqual([])
			}
		})
	})

	it("falls back to the basename outside a commands directory", async () => {
		await withTempDir(async (dir) => {
			const file = await writeFileDeep(
				join(dir, "docs", "review.md"),
				markdown({ "allowed-tools": "Read, Grep", description: "Review", model: "fast" }),
			)

			const result = await loadCommand(abs(file))

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.name).toBe("review")
				expect(result.value.allowedTools).toEqual(["Read", "Grep"])
				expect(result.value.model).toBe("fast")
			}
		})
	})

	it("requires a description", async () => {
		await withTempDir(async (dir) => {
			const file = await writeFileDeep(
				join(dir, "commands", "empty.md"),
				markdown({ model: "fast" }),
			)

			const result = await loadCommand(abs(file))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("validation")
			}
		})
	})

	it("reports a missing file as not_found", async () => {
		await withTempDir(async (dir) => {
			const result = await loadCommand(abs(join(dir, "commands", "gone.md")))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("not_found")
			}
		})
	})
})

describe("loadAgent", () => {
	it("reads tools and model", async () => {
		await withTempDir(async (dir) => {
			const file = await writeFileDeep(
				join(dir, "agents", "security", "auditor.md"),
				markdown({ description: "Audits code", model: "large", tools: "[Read, Grep]" }),
			)

			const result = await loadAgent(abs(file))

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.name).toBe("security/auditor")
				expect(result.value.tools).toEqual(["Read", "Grep"])
				expect(result.value.model).toBe("large")
			}
		})
	})

	it("derives names relative to an explicit base directory", async () => {
		await withTempDir(async (dir) => {
			const file = await writeAgent(dir, "planner")

			const result = await loadAgent(abs(file), { baseDir: abs(join(dir, "agents")) })

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.name).toBe("planner")
			}
		})
	})
})

describe("loadSkill", () => {
	it("loads a skill directory", async () => {
		await withTempDir(async (dir) => {
			const skillDir = await writeSkill(dir, "pdf-tools", "Work with PDF files")

			const result = await loadSkill(abs(skillDir))

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value).toEqual({
					author: undefined,
					description: "Work with PDF files",
					license: undefined,
					name: "pdf-tools",
					path: skillDir,
					type: "skill",
					version: undefined,
				})
			}
		})
	})

	it("rejects a frontmatter name that differs from the directory", async () => {
		await withTempDir(async (dir) => {
			const skillDir = join(dir, "skills", "pdf-tools")
			await writeFileDeep(
				join(skillDir, "SKILL.md"),
				markdown({ description: "PDF", name: "pdf" }),
			)

			const result = await loadSkill(abs(skillDir))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.message).toBe(
					"Skill name 'pdf' must match its directory name 'pdf-tools'.",
				)
			}
		})
	})

	it("rejects descriptions over 1024 characters", async () => {
		await withTempDir(async (dir) => {
			const skillDir = await writeSkill(dir, "verbose", "x".repeat(1025))

			const result = await loadSkill(abs(skillDir))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("validation")
			}
		})
	})

	it("rejects a directory without SKILL.md", async () => {
		await withTempDir(async (dir) => {
			const skillDir = join(dir, "skills", "empty")
			await writeFileDeep(join(skillDir, "README.md"), "# Empty\n")

			const result = await loadSkill(abs(skillDir))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.message).toBe(`Skill directory is missing SKILL.md: ${skillDir}`)
			}
		})
	})
})

describe("loadPackage", () => {
	it("parses member references", async () => {
		await withTempDir(async (dir) => {
			const file = await writePackage(dir, "starter", ["skill/pdf-tools", "command/api/deploy"])

			const result = await loadPackage(abs(file))

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.name).toBe("starter")
				expect(result.value.resources).toEqual([
					{ name: "pdf-tools", type: "skill" },
					{ name: "api/deploy", type: "command" },
				])
			}
		})
	})

	it("rejects packages that reference packages", async () => {
		await withTempDir(async (dir) => {
			const file = await writePackage(dir, "outer", ["package/inner"])

			const result = await loadPackage(abs(file))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.message).toBe(
					"Package 'outer' cannot reference another package (package/inner).",
				)
			}
		})
	})

	it("reports invalid JSON as a parse error", async () => {
		await withTempDir(async (dir) => {
			const file = await writeFileDeep(join(dir, "packages", "bad.package.json"), "{")

			const result = await loadPackage(abs(file))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("parse")
			}
		})
	})
})
