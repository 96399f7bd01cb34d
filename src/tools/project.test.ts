import { readFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import {
	addProjectResource,
	loadProjectManifest,
	removeProjectResource,
	saveProjectManifest,
} from "@/tools/project"
import { abs, withTempDir, writeFileDeep } from "../../tests/helpers"

describe("loadProjectManifest", () => {
	it("returns null when the project has no manifest", async () => {
		await withTempDir(async (dir) => {
			const result = await loadProjectManifest(abs(dir))

			expect(result).toEqual({ ok: true, value: null })
		})
	})

	it("reads resources and install targets", async () => {
		await withTempDir(async (dir) => {
			await writeFileDeep(
				join(dir, "ai.package.yaml"),
				"resources:\n  - skill/review\n  - command/deploy\ninstall:\n  targets: [claude]\n",
			)

			const result = await loadProjectManifest(abs(dir))

			expect(result).toEqual({
				ok: true,
				value: {
					install: { targets: ["claude"] },
					resources: ["skill/review", "command/deploy"],
				},
			})
		})
	})

	it("moves top-level targets under install", async () => {
		await withTempDir(async (dir) => {
			await writeFileDeep(join(dir, "ai.package.yaml"), "targets: [opencode]\n")

			const result = await loadProjectManifest(abs(dir))

			expect(result).toEqual({
				ok: true,
				value: { install: { targets: ["opencode"] }, resources: [] },
			})
		})
	})

	it("rejects malformed resource references", async () => {
		await withTempDir(async (dir) => {
			await writeFileDeep(join(dir, "ai.package.yaml"), "resources:\n  - widget/thing\n")

			const result = await loadProjectManifest(abs(dir))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("validation")
				expect(result.error.path).toBe(join(dir, "ai.package.yaml"))
			}
		})
	})

	it("reports invalid YAML as a parse error", async () => {
		await withTempDir(async (dir) => {
			await writeFileDeep(join(dir, "ai.package.yaml"), "resources: [unclosed\n")

			const result = await loadProjectManifest(abs(dir))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("parse")
			}
		})
	})
})

describe("saveProjectManifest", () => {
	it("omits empty install targets", async () => {
		await withTempDir(async (dir) => {
			const saved = await saveProjectManifest(abs(dir), {
				install: { targets: [] },
				resources: ["skill/review"],
			})

			expect(saved.ok).toBe(true)
			const contents = await readFile(join(dir, "ai.package.yaml"), "utf8")
			expect(contents).toBe("resources:\n  - skill/review\n")
		})
	})
})

describe("project resource edits", () => {
	it("adds once and removes", () => {
		const manifest = { install: { targets: [] }, resources: ["skill/review"] }

		const added = addProjectResource(addProjectResource(manifest, "command/deploy"), "command/deploy")
		const removed = removeProjectResource(added, "skill/review")

		expect(added.resources).toEqual(["skill/review", "command/deploy"])
		expect(removed.resources).toEqual(["command/deploy"])
	})
})
