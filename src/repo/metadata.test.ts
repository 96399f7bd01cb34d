import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { createRepoHandle, metadataPath } from "@/repo/handle"
import {
	attributedToSource,
	buildMetadata,
	deleteMetadata,
	listMetadata,
	loadMetadata,
	saveMetadata,
} from "@/repo/metadata"
import { abs, rname, withTempDir, writeFileDeep } from "../../tests/helpers"

const provenance = {
	sourceId: "src-1",
	sourceName: "team",
	sourceType: "github",
	sourceUrl: "https://github.com/example/team",
}

describe("buildMetadata", () => {
	it("keeps the first install time across updates", () => {
		const ref = { name: rname("deploy"), type: "command" as const }
		const first = buildMetadata(null, ref, provenance, new Date("2026-01-01T00:00:00.000Z"))
		const second = buildMetadata(first, ref, provenance, new Date("2026-02-01T00:00:00.000Z"))

		expect(second.first_installed).toBe("2026-01-01T00:00:00.000Z")
		expect(second.last_updated).toBe("2026-02-01T00:00:00.000Z")
		expect(second.source_name).toBe("team")
	})
})

describe("metadata files", () => {
	it("flattens nested names into the file name", () => {
		const handle = createRepoHandle(abs("/repo"))

		expect(metadataPath(handle, "command", "api/deploy")).toBe(
			"/repo/.metadata/commands/api-deploy-metadata.json",
		)
	})

	it("saves, loads and deletes a record", async () => {
		await withTempDir(async (dir) => {
			const handle = createRepoHandle(abs(dir))
			const record = buildMetadata(
				null,
				{ name: rname("review"), type: "skill" },
				provenance,
				new Date("2026-01-01T00:00:00.000Z"),
			)

			const saved = await saveMetadata(handle, record)
			const loaded = await loadMetadata(handle, "skill", "review")
			const deleted = await deleteMetadata(handle, "skill", "review")
			const again = await deleteMetadata(handle, "skill", "review")

			expect(saved.ok).toBe(true)
			expect(loaded).toEqual({ ok: true, value: record })
			expect(deleted).toEqual({ ok: true, value: true })
			expect(again).toEqual({ ok: true, value: false })
		})
	})

	it("returns null for a resource without a record", async () => {
		await withTempDir(async (dir) => {
			const result = await loadMetadata(createRepoHandle(abs(dir)), "agent", "helper")

			expect(result).toEqual({ ok: true, value: null })
		})
	})

	it("lists records and turns unreadable ones into warnings", async () => {
		await withTempDir(async (dir) => {
			const handle = createRepoHandle(abs(dir))
			const record = buildMetadata(
				null,
				{ name: rname("deploy"), type: "command" },
				provenance,
				new Date("2026-01-01T00:00:00.000Z"),
			)
			await saveMetadata(handle, record)
			await writeFileDeep(join(dir, ".metadata", "commands", "broken-metadata.json"), "{")
			await writeFileDeep(join(dir, ".metadata", "commands", "notes.txt"), "ignored")

			const result = await listMetadata(handle)

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.records).toEqual([record])
				expect(result.value.warnings).toHaveLength(1)
			}
		})
	})
})

describe("attributedToSource", () => {
	const record = buildMetadata(
		null,
		{ name: rname("deploy"), type: "command" },
		provenance,
		new Date("2026-01-01T00:00:00.000Z"),
	)

	it("matches on source id when both sides have one", () => {
		expect(attributedToSource(record, { id: "src-1", name: "renamed" })).toBe(true)
		expect(attributedToSource(record, { id: "src-2", name: "team" })).toBe(false)
	})

	it("falls back to the source name", () => {
		expect(attributedToSource(record, { name: "team" })).toBe(true)
		expect(attributedToSource({ ...record, source_id: undefined }, { id: "src-1", name: "other" })).toBe(
			false,
		)
	})
})
