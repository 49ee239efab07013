import { describe, expect, it } from "vitest"
import { assertAbsolutePathDirect } from "@larder/core"
import { joinRepoPath, normalizeRel } from "./rel"

describe("normalizeRel", () => {
	it("normalises separators and dots", () => {
		expect(normalizeRel("./cookbooks\\foo/")).toEqual({ ok: true, value: "cookbooks/foo" })
	})

	it("collapses the repository root to undefined", () => {
		expect(normalizeRel(".")).toEqual({ ok: true, value: undefined })
		expect(normalizeRel(undefined)).toEqual({ ok: true, value: undefined })
	})

	it("rejects empty, absolute and escaping paths", () => {
		expect(normalizeRel("  ").ok).toBe(false)
		expect(normalizeRel("/etc").ok).toBe(false)
		expect(normalizeRel("a/../../b").ok).toBe(false)
	})
})

describe("joinRepoPath", () => {
	it("appends the subpath to the clone", () => {
		const root = assertAbsolutePathDirect("/tmp/clone")
		expect(joinRepoPath(root, "a/b")).toBe("/tmp/clone/a/b")
		expect(joinRepoPath(root, undefined)).toBe("/tmp/clone")
	})
})
