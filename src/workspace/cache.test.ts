import { describe, expect, it } from "vitest"
import { createRepoHandle } from "@/repo/handle"
import { cacheDirFor } from "@/workspace/cache"
import { abs } from "../../tests/helpers"

describe("cacheDirFor", () => {
	const handle = createRepoHandle(abs("/repo"))

	it("shares one directory between spellings of a remote", () => {
		const plain = cacheDirFor(handle, "https://github.com/Example/Prompts")
		const suffixed = cacheDirFor(handle, "https://github.com/example/prompts.git/")

		expect(suffixed).toBe(plain)
		expect(plain).toMatch(/^\/repo\/\.workspace\/prompts-[0-9a-f]{12}$/)
	})

	it("keeps refs apart", () => {
		const main = cacheDirFor(handle, "https://github.com/example/prompts", "main")
		const tag = cacheDirFor(handle, "https://github.com/example/prompts", "v1.0.0")

		expect(main).not.toBe(tag)
	})
})
