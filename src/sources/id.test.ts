import { describe, expect, it } from "vitest"
import {
	computeSourceId,
	generateSourceName,
	normalizeGitUrl,
	sourceTypeForUrl,
} from "@/sources/id"

describe("normalizeGitUrl", () => {
	it("lowercases and strips a trailing slash and .git", () => {
		expect(normalizeGitUrl(" https://GitHub.com/Owner/Repo.git ")).toBe(
			"https://github.com/owner/repo",
		)
		expect(normalizeGitUrl("https://github.com/owner/repo/")).toBe(
			"https://github.com/owner/repo",
		)
	})
})

describe("computeSourceId", () => {
	it("is stable across equivalent URLs", () => {
		const a = computeSourceId({ url: "https://github.com/owner/repo.git" })
		const b = computeSourceId({ url: "https://GITHUB.com/owner/repo/" })
		expect(a).toBe(b)
		expect(a).toMatch(/^src-[0-9a-f]{12}$/)
	})

	it("resolves paths before hashing", () => {
		expect(computeSourceId({ path: "/work/tools/../tools" })).toBe(
			computeSourceId({ path: "/work/tools" }),
		)
	})

	it("differs between locations", () => {
		expect(computeSourceId({ path: "/work/a" })).not.toBe(computeSourceId({ path: "/work/b" }))
	})
})

describe("generateSourceName", () => {
	it("uses the last URL segment without .git", () => {
		expect(generateSourceName({ url: "https://github.com/owner/Team_Tools.git" })).toBe(
			"team-tools",
		)
	})

	it("handles scp-style URLs", () => {
		expect(generateSourceName({ url: "git@example.com:prompts.git" })).toBe("prompts")
	})

	it("uses the directory name for paths", () => {
		expect(generateSourceName({ path: "/home/me/My Prompts" })).toBe("my-prompts")
	})

	it("falls back to 'source' when nothing usable remains", () => {
		expect(generateSourceName({ path: "/home/me/___" })).toBe("source")
	})
})

describe("sourceTypeForUrl", () => {
	it("recognizes github.com over https and ssh", () => {
		expect(sourceTypeForUrl("https://github.com/owner/repo")).toBe("github")
		expect(sourceTypeForUrl("git@github.com:owner/repo.git")).toBe("github")
	})

	it("treats other hosts as plain git URLs", () => {
		expect(sourceTypeForUrl("https://gitlab.com/owner/repo")).toBe("git-url")
	})
})
