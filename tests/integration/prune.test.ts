import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { buildMetadata, saveMetadata } from "@/repo/metadata"
import { addSource, createEmptyManifest, saveSourceManifest } from "@/sources/manifest"
import { cacheDirFor } from "@/workspace/cache"
import { findUnreferencedCaches, formatSize, pruneWorkspace } from "@/workspace/prune"
import { exists, rname, testRepo, withTempDir, writeFileDeep } from "../helpers"

const NOW = new Date("2026-03-01T10:00:00.000Z")
const PROMPTS_URL = "https://github.com/example/prompts"
const SKILLS_URL = "https://github.com/example/skills"

async function setup(dir: string) {
	const handle = testRepo(dir)
	const added = addSource(createEmptyManifest(), { url: PROMPTS_URL }, NOW)
	expect(added.ok).toBe(true)
	if (added.ok) {
		await saveSourceManifest(handle, added.value.manifest)
	}
	await saveMetadata(
		handle,
		buildMetadata(
			null,
			{ name: rname("review"), type: "skill" },
			{ ref: "v1", sourceType: "github", sourceUrl: SKILLS_URL },
			NOW,
		),
	)

	const bySource = cacheDirFor(handle, PROMPTS_URL)
	const byRecord = cacheDirFor(handle, SKILLS_URL, "v1")
	const stale = join(handle.workspaceDir, "old-prompts-0123456789ab")
	await writeFileDeep(join(bySource, "commands", "deploy.md"), "deploy")
	await writeFileDeep(join(byRecord, "skills", "review", "SKILL.md"), "review")
	await writeFileDeep(join(stale, "commands", "lint.md"), "12345678")
	await writeFileDeep(join(stale, "README.md"), "1234")
	return { byRecord, bySource, handle, stale }
}

describe("pruneWorkspace", () => {
	it("finds checkouts no source or record refers to", async () => {
		await withTempDir(async (dir) => {
			const { handle, stale } = await setup(dir)

			const found = await findUnreferencedCaches(handle)

			expect(found.ok && found.value).toEqual([
				{ name: "old-prompts-0123456789ab", path: stale, sizeBytes: 12 },
			])
		})
	})

	it("lists without removing on a dry run", async () => {
		await withTempDir(async (dir) => {
			const { handle, stale } = await setup(dir)

			const result = await pruneWorkspace(handle, { dryRun: true })

			expect(result.ok && result.value.unreferenced.map((entry) => entry.name)).toEqual([
				"old-prompts-0123456789ab",
			])
			expect(result.ok && result.value.removed).toEqual([])
			expect(await exists(stale)).toBe(true)
		})
	})

	it("removes only unreferenced checkouts", async () => {
		await withTempDir(async (dir) => {
			const { byRecord, bySource, handle, stale } = await setup(dir)

			const result = await pruneWorkspace(handle)

			expect(result.ok && result.value.removed.map((entry) => entry.name)).toEqual([
				"old-prompts-0123456789ab",
			])
			expect(await exists(stale)).toBe(false)
			expect(await exists(bySource)).toBe(true)
			expect(await exists(byRecord)).toBe(true)
		})
	})

	it("has nothing to do without a workspace", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)

			const result = await pruneWorkspace(handle)

			expect(result.ok && result.value.unreferenced).toEqual([])
		})
	})
})

describe("formatSize", () => {
	it("scales to the largest whole unit", () => {
		expect(formatSize(512)).toBe("512 B")
		expect(formatSize(1536)).toBe("1.5 KB")
		expect(formatSize(12 * 1024 * 1024)).toBe("12.0 MB")
	})
})
