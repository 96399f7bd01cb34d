import { describe, expect, it } from "vitest"
import {
	coerceAbsolutePath,
	coerceResourceName,
	coerceSourceId,
	coerceSourceName,
	nameSegmentProblem,
} from "@/types/coerce"

describe("nameSegmentProblem", () => {
	it("accepts lowercase names with single hyphens", () => {
		expect(nameSegmentProblem("pdf-tools")).toBeNull()
		expect(nameSegmentProblem("a1")).toBeNull()
		expect(nameSegmentProblem("x")).toBeNull()
	})

	it("rejects empty segments", () => {
		expect(nameSegmentProblem("")).toBe("must not be empty")
	})

	it("rejects segments longer than 64 characters", () => {
		expect(nameSegmentProblem("a".repeat(64))).toBeNull()
		expect(nameSegmentProblem("a".repeat(65))).toBe("must be at most 64 characters")
	})

	it("rejects uppercase, underscores and edge hyphens", () => {
		const message =
			"must contain only lowercase letters, digits and hyphens, and must not start or end with a hyphen"
		expect(nameSegmentProblem("Deploy")).toBe(message)
		expect(nameSegmentProblem("my_skill")).toBe(message)
		expect(nameSegmentProblem("-lead")).toBe(message)
		expect(nameSegmentProblem("trail-")).toBe(message)
	})

	it("rejects consecutive hyphens", () => {
		expect(nameSegmentProblem("a--b")).toBe("must not contain consecutive hyphens")
	})
})

describe("coerceResourceName", () => {
	it("accepts nested names only when allowed", () => {
		expect(coerceResourceName("api/deploy", true)).toBe("api/deploy")
		expect(coerceResourceName("api/deploy", false)).toBeNull()
	})

	it("rejects an empty nested segment", () => {
		expect(coerceResourceName("api//deploy", true)).toBeNull()
		expect(coerceResourceName("api/", true)).toBeNull()
	})

	it("trims surrounding whitespace", () => {
		expect(coerceResourceName("  review  ", false)).toBe("review")
	})
})

describe("coerceSourceName", () => {
	it("accepts a single valid segment", () => {
		expect(coerceSourceName("team-tools")).toBe("team-tools")
	})

	it("rejects slashes", () => {
		expect(coerceSourceName("team/tools")).toBeNull()
	})
})

describe("coerceSourceId", () => {
	it("accepts generated ids", () => {
		expect(coerceSourceId("src-0123456789ab")).toBe("src-0123456789ab")
	})

	it("rejects other strings", () => {
		expect(coerceSourceId("0123456789ab")).toBeNull()
		expect(coerceSourceId("src-XYZ")).toBeNull()
	})
})

describe("coerceAbsolutePath", () => {
	it("keeps absolute paths, normalized", () => {
		expect(coerceAbsolutePath("/tmp/a/../b")).toBe("/tmp/b")
	})

	it("resolves relative paths against the base", () => {
		expect(coerceAbsolutePath("project", "/work")).toBe("/work/project")
	})

	it("rejects relative paths without a base", () => {
		expect(coerceAbsolutePath("project")).toBeNull()
	})

	it("rejects blank input", () => {
		expect(coerceAbsolutePath("   ", "/work")).toBeNull()
	})
})
