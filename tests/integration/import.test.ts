import { readFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { importResources } from "@/repo/import"
import { loadMetadata } from "@/repo/metadata"
import {
	abs,
	exists,
	isSymlink,
	snapshotTree,
	testRepo,
	withTempDir,
	writeCommand,
	writeSkill,
} from "../helpers"

describe("importResources", () => {
	it("copies a command and records file provenance", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const file = await writeCommand(join(dir, "a"), "deploy")

			const result = await importResources(handle, [abs(file)], {
				mode: "copy",
				now: new Date("2026-03-01T00:00:00.000Z"),
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.added.map((entry) => entry.ref)).toEqual([
					{ name: "deploy", type: "command" },
				])
				expect(result.value.counts.command).toBe(1)
			}
			expect(await isSymlink(join(handle.root, "commands", "deploy.md"))).toBe(false)
			const metadata = await loadMetadata(handle, "command", "deploy")
			expect(metadata.ok && metadata.value?.source_url).toBe(`file://${file}`)
			expect(metadata.ok && metadata.value?.source_type).toBe("file")
		})
	})

	it("links a skill directory in symlink mode", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const skillDir = await writeSkill(join(dir, "a"), "review")

			const result = await importResources(handle, [abs(skillDir)], { mode: "symlink" })

			expect(result.ok).toBe(true)
			expect(await isSymlink(join(handle.root, "skills", "review"))).toBe(true)
		})
	})

	it("expands a directory candidate through discovery", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const source = join(dir, "a")
			await writeCommand(source, "deploy")
			await writeSkill(source, "review")

			const result = await importResources(handle, [abs(source)], { mode: "copy" })

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.added.map((entry) => entry.ref.name)).toEqual(["deploy", "review"])
			}
		})
	})

	it("records an unloadable candidate as failed and continues", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const good = await writeCommand(join(dir, "a"), "deploy")

			const result = await importResources(
				handle,
				[abs(join(dir, "missing.md")), abs(good)],
				{ mode: "copy" },
			)

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.failed.map((entry) => entry.path)).toEqual([join(dir, "missing.md")])
				expect(result.value.added).toHaveLength(1)
			}
		})
	})

	it("refuses a nested name whose metadata file another name holds", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			await writeCommand(join(dir, "a"), "api-deploy")
			await writeCommand(join(dir, "b"), "api/deploy")
			await importResources(handle, [abs(join(dir, "a"))], { mode: "copy" })

			const result = await importResources(handle, [abs(join(dir, "b"))], {
				force: true,
				mode: "copy",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.added).toEqual([])
				expect(result.value.failed.map((entry) => entry.message)).toEqual([
					"resource 'command/api/deploy' would share its metadata file with 'command/api-deploy'",
				])
			}
			expect(await exists(join(handle.root, "commands", "api", "deploy.md"))).toBe(false)
			const kept = await loadMetadata(handle, "command", "api-deploy")
			expect(kept.ok && kept.value?.name).toBe("api-deploy")
		})
	})

	it("stores only one of two names that flatten alike in one batch", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const source = join(dir, "a")
			await writeCommand(source, "api-deploy")
			await writeCommand(source, "api/deploy")

			const result = await importResources(handle, [abs(source)], { mode: "copy" })

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.added).toHaveLength(1)
				expect(result.value.failed).toHaveLength(1)
				expect(result.value.failed[0]?.error.type).toBe("conflict")
			}
		})
	})
})

describe("import conflict policy", () => {
	async function seed(dir: string) {
		const handle = testRepo(dir)
		const original = await writeCommand(join(dir, "a"), "deploy", "Original")
		const seeded = await importResources(handle, [abs(original)], { mode: "copy" })
		expect(seeded.ok).toBe(true)
		const incoming = await writeCommand(join(dir, "b"), "deploy", "Incoming")
		return { handle, incoming }
	}

	it("fails on an existing resource without a policy", async () => {
		await withTempDir(async (dir) => {
			const { handle, incoming } = await seed(dir)
			const fresh = await writeCommand(join(dir, "b"), "lint")

			const result = await importResources(handle, [abs(incoming), abs(fresh)], { mode: "copy" })

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("conflict")
				expect(result.error.message).toBe(
					"1 resource(s) already exist in repository (command/deploy). Use force or skip-existing.",
				)
				expect(result.error.report.failed.map((entry) => entry.path)).toEqual([incoming])
				expect(result.error.report.added.map((entry) => entry.ref.name)).toEqual(["lint"])
			}
			const stored = await readFile(join(handle.root, "commands", "deploy.md"), "utf8")
			expect(stored).toContain("description: Original")
		})
	})

	it("skips existing resources with skipExisting", async () => {
		await withTempDir(async (dir) => {
			const { handle, incoming } = await seed(dir)

			const result = await importResources(handle, [abs(incoming)], {
				mode: "copy",
				skipExisting: true,
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.skipped).toEqual([{ name: "deploy", type: "command" }])
				expect(result.value.added).toEqual([])
			}
		})
	})

	it("overwrites existing resources with force", async () => {
		await withTempDir(async (dir) => {
			const { handle, incoming } = await seed(dir)

			const result = await importResources(handle, [abs(incoming)], {
				force: true,
				mode: "copy",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.added.map((entry) => entry.replaced)).toEqual([true])
			}
			const stored = await readFile(join(handle.root, "commands", "deploy.md"), "utf8")
			expect(stored).toContain("description: Incoming")
		})
	})

	it("treats a name repeated within one batch as existing", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const first = await writeCommand(join(dir, "a"), "deploy")
			const second = await writeCommand(join(dir, "b"), "deploy")

			const result = await importResources(handle, [abs(first), abs(second)], {
				mode: "copy",
				skipExisting: true,
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.added).toHaveLength(1)
				expect(result.value.skipped).toHaveLength(1)
			}
		})
	})

	it("reports the same outcome on a dry run and writes nothing", async () => {
		await withTempDir(async (dir) => {
			const { handle, incoming } = await seed(dir)
			const fresh = await writeCommand(join(dir, "b"), "lint")
			const before = await snapshotTree(handle.root)

			const result = await importResources(handle, [abs(incoming), abs(fresh)], {
				dryRun: true,
				mode: "copy",
				skipExisting: true,
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.dryRun).toBe(true)
				expect(result.value.added.map((entry) => entry.ref.name)).toEqual(["lint"])
				expect(result.value.skipped.map((ref) => ref.name)).toEqual(["deploy"])
			}
			expect(await snapshotTree(handle.root)).toEqual(before)
			expect(await exists(join(handle.root, "commands", "lint.md"))).toBe(false)
		})
	})

	it.each([
		["skipExisting", { skipExisting: true }],
		["force", { force: true }],
		["no policy", {}],
	] as const)("matches a real run on a dry run with %s", async (_label, policy) => {
		await withTempDir(async (dir) => {
			const { handle, incoming } = await seed(dir)
			const fresh = await writeCommand(join(dir, "b"), "lint")
			const candidates = [abs(incoming), abs(fresh)]

			const planned = await importResources(handle, candidates, {
				...policy,
				dryRun: true,
				mode: "copy",
			})
			const applied = await importResources(handle, candidates, { ...policy, mode: "copy" })

			expect(outcome(planned)).toEqual(outcome(applied))
		})
	})

	it("returns the same conflict on a dry run as on a real run", async () => {
		await withTempDir(async (dir) => {
			const { handle, incoming } = await seed(dir)

			const planned = await importResources(handle, [abs(incoming)], {
				dryRun: true,
				mode: "copy",
			})
			const applied = await importResources(handle, [abs(incoming)], { mode: "copy" })

			expect(planned.ok).toBe(false)
			expect(applied.ok).toBe(false)
			if (!planned.ok && !applied.ok) {
				expect(planned.error.type).toBe("conflict")
				expect(planned.error.message).toBe(applied.error.message)
				expect(planned.error.report.failed).toEqual(applied.error.report.failed)
			}
		})
	})
})

type ImportResult = Awaited<ReturnType<typeof importResources>>

function outcome(result: ImportResult) {
	const report = result.ok ? result.value : result.error.report
	return {
		added: report.added,
		counts: report.counts,
		error: result.ok ? null : result.error.message,
		failed: report.failed,
		skipped: report.skipped,
	}
}
