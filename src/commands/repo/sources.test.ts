import { describe, expect, it } from "vitest"
import { buildSourceViews } from "@/commands/repo/sources"
import { addSource, createEmptyManifest } from "@/sources/manifest"
import { createEmptyState, setAdded, setLastSynced } from "@/sources/state"

describe("buildSourceViews", () => {
	it("prefers recorded state times over the manifest", () => {
		const added = addSource(
			createEmptyManifest(),
			{ name: "team", ref: "main", url: "https://github.com/example/team.git" },
			new Date("2026-01-01T00:00:00.000Z"),
		)
		expect(added.ok).toBe(true)
		if (!added.ok) {
			return
		}

		const state = setLastSynced(
			setAdded(createEmptyState(), "team", added.value.source.id, new Date("2026-01-02T00:00:00.000Z")),
			"team",
			new Date("2026-01-03T00:00:00.000Z"),
		)

		expect(buildSourceViews(added.value.manifest, state)).toEqual([
			{
				added: "2026-01-02T00:00:00.000Z",
				id: added.value.source.id,
				last_synced: "2026-01-03T00:00:00.000Z",
				location: "https://github.com/example/team.git",
				mode: "copy",
				name: "team",
				ref: "main",
				subpath: undefined,
			},
		])
	})

	it("falls back to manifest times for sources without state", () => {
		const added = addSource(
			createEmptyManifest(),
			{ path: "/work/prompts" },
			new Date("2026-01-01T00:00:00.000Z"),
		)
		expect(added.ok).toBe(true)
		if (!added.ok) {
			return
		}

		const [view] = buildSourceViews(added.value.manifest, createEmptyState())

		expect(view?.name).toBe("prompts")
		expect(view?.location).toBe("/work/prompts")
		expect(view?.mode).toBe("symlink")
		expect(view?.added).toBe("2026-01-01T00:00:00.000Z")
		expect(view?.last_synced).toBeUndefined()
	})
})
