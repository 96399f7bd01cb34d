import { rm } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { formatDiscoveryCounts } from "@/discovery"
import { formatImportSummary } from "@/repo/import"
import { listMetadata, loadMetadata } from "@/repo/metadata"
import { formatResourceRef } from "@/resources/ref"
import { loadSourceManifest } from "@/sources/manifest"
import { addSourceAndImport, parseLocation, removeSourceAndResources } from "@/sources/operations"
import { loadSourceState } from "@/sources/state"
import {
	entryExists,
	isSymlink,
	snapshotTree,
	testRepo,
	withTempDir,
	writeCommand,
	writeSkill,
} from "../helpers"

const NOW = new Date("2026-03-01T10:00:00.000Z")

async function writeSource(dir: string): Promise<string> {
	const source = join(dir, "team-prompts")
	await writeCommand(source, "deploy")
	await writeCommand(source, "lint")
	await writeSkill(source, "review")
	return source
}

describe("addSourceAndImport", () => {
	it("registers a local source and links what it provides", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const source = await writeSource(dir)

			const result = await addSourceAndImport(handle, { location: source }, { cwd: dir, now: NOW })

			expect(result.ok).toBe(true)
			if (!result.ok) {
				return
			}
			expect(result.value.source.name).toBe("team-prompts")
			expect(result.value.source.mode).toBe("symlink")
			expect(formatDiscoveryCounts(result.value.discovered)).toBe(
				"2 commands, 1 skills, 0 agents, 0 packages",
			)
			expect(formatImportSummary(result.value.report)).toBe("3 added, 0 skipped, 0 failed")
			expect(await isSymlink(join(handle.root, "commands", "deploy.md"))).toBe(true)
			expect(await isSymlink(join(handle.root, "skills", "review"))).toBe(true)

			const metadata = await loadMetadata(handle, "skill", "review")
			expect(metadata.ok && metadata.value?.source_name).toBe("team-prompts")
			expect(metadata.ok && metadata.value?.source_id).toBe(result.value.source.id)

			const manifest = await loadSourceManifest(handle)
			expect(manifest.ok && manifest.value.sources.map((entry) => entry.name)).toEqual([
				"team-prompts",
			])

			const state = await loadSourceState(handle)
			expect(state.ok && state.value.sources["team-prompts"]?.added).toBe(NOW.toISOString())
		})
	})

	it("rejects a second source at the same location", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const source = await writeSource(dir)
			await addSourceAndImport(handle, { location: source }, { cwd: dir, now: NOW })

			const again = await addSourceAndImport(
				handle,
				{ location: source, name: "other" },
				{ cwd: dir, now: NOW },
			)

			expect(again.ok).toBe(false)
			if (!again.ok) {
				expect(again.error.type).toBe("conflict")
				expect(again.error.message).toBe(
					"Source with same location already exists as 'team-prompts'.",
				)
			}
		})
	})

	it("saves the source when some resources conflict", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			await addSourceAndImport(handle, { location: await writeSource(dir) }, { cwd: dir, now: NOW })
			const second = join(dir, "more")
			await writeCommand(second, "deploy")
			await writeCommand(second, "ship")

			const result = await addSourceAndImport(handle, { location: second }, { cwd: dir, now: NOW })

			expect(result.ok).toBe(false)
			if (!result.ok && "report" in result.error) {
				expect(result.error.report.added.map((entry) => entry.ref.name)).toEqual(["ship"])
			}
			const manifest = await loadSourceManifest(handle)
			expect(manifest.ok && manifest.value.sources.map((entry) => entry.name)).toEqual([
				"team-prompts",
				"more",
			])
		})
	})

	it("changes nothing on a dry run", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			await addSourceAndImport(handle, { location: await writeSource(dir) }, { cwd: dir, now: NOW })
			const second = join(dir, "more")
			await writeCommand(second, "deploy")
			await writeCommand(second, "ship")
			const before = await snapshotTree(handle.root)

			const result = await addSourceAndImport(
				handle,
				{ location: second },
				{ cwd: dir, dryRun: true, now: NOW, skipExisting: true },
			)

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(formatImportSummary(result.value.report)).toBe("1 added, 1 skipped, 0 failed")
			}
			expect(await snapshotTree(handle.root)).toEqual(before)
		})
	})
})

describe("removeSourceAndResources", () => {
	it("removes the source with its resources and state", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			await addSourceAndImport(handle, { location: await writeSource(dir) }, { cwd: dir, now: NOW })

			const result = await removeSourceAndResources(handle, "team-prompts")

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.removed.map(formatResourceRef).sort()).toEqual([
					"command/deploy",
					"command/lint",
					"skill/review",
				])
			}
			expect(await entryExists(join(handle.root, "commands", "deploy.md"))).toBe(false)
			expect(await entryExists(join(handle.root, "skills", "review"))).toBe(false)
			const manifest = await loadSourceManifest(handle)
			expect(manifest.ok && manifest.value.sources).toEqual([])
			const state = await loadSourceState(handle)
			expect(state.ok && state.value.sources).toEqual({})
		})
	})

	it("leaves nothing behind for names that flatten alike", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const source = join(dir, "mixed")
			await writeCommand(source, "api-deploy")
			await writeCommand(source, "api/deploy")
			const added = await addSourceAndImport(handle, { location: source }, { cwd: dir, now: NOW })
			expect(added.ok && added.value.report.failed).toHaveLength(1)

			const result = await removeSourceAndResources(handle, "mixed")

			expect(result.ok && result.value.removed).toHaveLength(1)
			expect(await entryExists(join(handle.root, "commands", "api-deploy.md"))).toBe(false)
			expect(await entryExists(join(handle.root, "commands", "api", "deploy.md"))).toBe(false)
			const scan = await listMetadata(handle)
			expect(scan.ok && scan.value.records).toEqual([])
		})
	})

	it("keeps resources when asked", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			await addSourceAndImport(handle, { location: await writeSource(dir) }, { cwd: dir, now: NOW })

			const result = await removeSourceAndResources(handle, "team-prompts", {
				keepResources: true,
			})

			expect(result.ok && result.value.removed).toEqual([])
			expect(await entryExists(join(handle.root, "commands", "deploy.md"))).toBe(true)
		})
	})

	it("tolerates resources already deleted by hand", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			await addSourceAndImport(handle, { location: await writeSource(dir) }, { cwd: dir, now: NOW })
			await rm(join(handle.root, "commands", "deploy.md"))

			const result = await removeSourceAndResources(handle, "team-prompts")

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.removed).toHaveLength(3)
			}
			const metadata = await loadMetadata(handle, "command", "deploy")
			expect(metadata).toEqual({ ok: true, value: null })
		})
	})

	it("lists without removing on a dry run", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			await addSourceAndImport(handle, { location: await writeSource(dir) }, { cwd: dir, now: NOW })

			const result = await removeSourceAndResources(handle, "team-prompts", { dryRun: true })

			expect(result.ok && result.value.removed).toHaveLength(3)
			expect(await entryExists(join(handle.root, "commands", "deploy.md"))).toBe(true)
		})
	})

	it("fails for an unknown source", async () => {
		await withTempDir(async (dir) => {
			const result = await removeSourceAndResources(testRepo(dir), "nobody")

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.type).toBe("not_found")
			}
		})
	})
})

describe("parseLocation", () => {
	it("treats URLs and gh: shorthands as remote", async () => {
		expect(await parseLocation("https://example.com/a.git", "/tmp")).toEqual({
			url: "https://example.com/a.git",
		})
		expect(await parseLocation("gh:example/prompts", "/tmp")).toEqual({
			url: "https://github.com/example/prompts",
		})
	})

	it("prefers an existing directory over owner/repo shorthand", async () => {
		await withTempDir(async (dir) => {
			await writeCommand(join(dir, "example", "prompts"), "deploy")

			expect(await parseLocation("example/prompts", dir)).toEqual({
				path: join(dir, "example", "prompts"),
			})
			expect(await parseLocation("example/other", dir)).toEqual({
				url: "https://github.com/example/other",
			})
		})
	})
})
