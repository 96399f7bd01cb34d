import { rm, symlink } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { importResources } from "@/repo/import"
import { loadMetadata } from "@/repo/metadata"
import {
	formatRepairSummary,
	hasVerifyErrors,
	repairRepository,
	verifyRepository,
} from "@/repo/verify"
import { updateResources } from "@/sync/update"
import {
	abs,
	entryExists,
	rname,
	snapshotTree,
	testRepo,
	withTempDir,
	writeCommand,
	writePackage,
	writeSkill,
} from "../helpers"

const NOW = new Date("2026-03-01T10:00:00.000Z")

/**
 * One of each problem: a file without metadata (stray), metadata without a
 * file (lint), a vanished source path (review) and a package member that
 * was never imported (skill/missing).
 */
async function damagedRepo(dir: string) {
	const handle = testRepo(dir)
	const source = join(dir, "source")
	await writeCommand(source, "deploy")
	await writeCommand(source, "lint")
	await writeSkill(source, "review")
	await writePackage(source, "kit", ["command/deploy", "skill/missing"])
	const imported = await importResources(handle, [abs(source)], { mode: "copy", now: NOW })
	expect(imported.ok).toBe(true)

	await writeCommand(handle.root, "stray")
	await rm(join(handle.root, "commands", "lint.md"))
	await rm(join(source, "skills", "review"), { force: true, recursive: true })
	return { handle, source }
}

describe("verifyRepository", () => {
	it("reports each kind of inconsistency once", async () => {
		await withTempDir(async (dir) => {
			const { handle, source } = await damagedRepo(dir)

			const result = await verifyRepository(handle)

			expect(result.ok).toBe(true)
			if (!result.ok) {
				return
			}
			expect(result.value).toEqual({
				incompletePackages: [{ missing: ["skill/missing"], ref: { name: "kit", type: "package" } }],
				missingMetadata: [{ name: "stray", type: "command" }],
				missingSourcePaths: [
					{ ref: { name: "review", type: "skill" }, sourcePath: join(source, "skills", "review") },
				],
				orphanedMetadata: [
					{
						metadataPath: join(handle.root, ".metadata", "commands", "lint-metadata.json"),
						ref: { name: "lint", type: "command" },
					},
				],
				warnings: [],
			})
			expect(hasVerifyErrors(result.value)).toBe(true)
		})
	})

	it("checks only the requested type", async () => {
		await withTempDir(async (dir) => {
			const { handle } = await damagedRepo(dir)

			const result = await verifyRepository(handle, "skill")

			expect(result.ok && result.value.missingMetadata).toEqual([])
			expect(result.ok && result.value.orphanedMetadata).toEqual([])
			expect(result.ok && result.value.incompletePackages).toEqual([])
			expect(result.ok && result.value.missingSourcePaths.map((entry) => entry.ref.name)).toEqual([
				"review",
			])
		})
	})

	it("finds nothing wrong in a consistent repository", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const source = join(dir, "source")
			await writeCommand(source, "deploy")
			await importResources(handle, [abs(source)], { mode: "copy", now: NOW })

			const result = await verifyRepository(handle)

			expect(result.ok && hasVerifyErrors(result.value)).toBe(false)
			expect(result.ok && result.value.missingMetadata).toEqual([])
		})
	})
})

describe("repairRepository", () => {
	it("writes missing metadata and drops orphaned records", async () => {
		await withTempDir(async (dir) => {
			const { handle } = await damagedRepo(dir)

			const result = await repairRepository(handle)

			expect(result.ok).toBe(true)
			if (!result.ok) {
				return
			}
			expect(result.value.created).toEqual([{ name: "stray", type: "command" }])
			expect(result.value.removed.map((entry) => entry.ref)).toEqual([
				{ name: "lint", type: "command" },
			])
			expect(formatRepairSummary(result.value)).toBe("2 fixed, 1 unfixable")

			const stray = await loadMetadata(handle, "command", "stray")
			expect(stray.ok && stray.value?.source_type).toBe("repository")
			expect(stray.ok && stray.value?.source_url).toBe(
				`file://${join(handle.root, "commands", "stray.md")}`,
			)
			expect(
				await entryExists(join(handle.root, ".metadata", "commands", "lint-metadata.json")),
			).toBe(false)

			const after = await verifyRepository(handle)
			expect(after.ok && after.value.missingMetadata).toEqual([])
			expect(after.ok && after.value.orphanedMetadata).toEqual([])
			expect(after.ok && after.value.incompletePackages).toHaveLength(1)
		})
	})

	it("plans the same fixes on a dry run and writes nothing", async () => {
		await withTempDir(async (dir) => {
			const { handle } = await damagedRepo(dir)
			const before = await snapshotTree(handle.root)

			const result = await repairRepository(handle, { dryRun: true })

			expect(result.ok && formatRepairSummary(result.value)).toBe("2 planned, 1 unfixable")
			expect(result.ok && result.value.created).toEqual([{ name: "stray", type: "command" }])
			expect(await snapshotTree(handle.root)).toEqual(before)
		})
	})

	it("records a link's target so the resource can be updated", async () => {
		await withTempDir(async (dir) => {
			const handle = testRepo(dir)
			const external = await writeCommand(join(dir, "elsewhere"), "linked")
			await writeCommand(handle.root, "placeholder")
			await symlink(external, join(handle.root, "commands", "linked.md"))

			await repairRepository(handle)

			const metadata = await loadMetadata(handle, "command", "linked")
			expect(metadata.ok && metadata.value?.source_type).toBe("file")
			expect(metadata.ok && metadata.value?.source_url).toBe(`file://${external}`)

			const updated = await updateResources(handle, [
				{ name: rname("linked"), type: "command" },
				{ name: rname("placeholder"), type: "command" },
			])
			expect(updated.ok && updated.value.results.map((entry) => entry.status)).toEqual([
				"skipped",
				"updated",
			])
			expect(
				updated.ok &&
					updated.value.results.flatMap((entry) =>
						entry.status === "skipped" ? [entry.reason] : [],
					),
			).toEqual(["no_source"])
		})
	})
})
