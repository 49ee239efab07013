import { Range } from "semver"
import { describe, expect, it } from "vitest"
import type { PointerState } from "../types"
import {
	buildTagPattern,
	matchVersionTags,
	resolveVersionTemplate,
	selectHighestTag,
} from "./tags"

const between = new Range(">=1.1.0 <1.3.0")
const any = new Range("*")

describe("buildTagPattern", () => {
	it("matches the whole tag name", () => {
		const pattern = buildTagPattern("v${version}")

		expect(pattern.exec("v1.2.0")?.[1]).toBe("1.2.0")
		expect(pattern.test("v1.2.0-rc.1")).toBe(false)
		expect(pattern.test("xv1.2.0")).toBe(false)
		expect(pattern.test("v1.2")).toBe(false)
	})

	it("matches the rest of the template literally", () => {
		const pattern = buildTagPattern("release.${version}+final")

		expect(pattern.test("release.1.0.0+final")).toBe(true)
		expect(pattern.test("releaseX1.0.0+final")).toBe(false)
		expect(pattern.test("release.1.0.0final")).toBe(false)
	})
})

describe("matchVersionTags", () => {
	it("keeps matching tags that satisfy the range", () => {
		const candidates = matchVersionTags(
			["v1.0.0", "v1.2.0", "other-1.2.5", "v1.2.5", "v1.3.0"],
			"v${version}",
			between,
		)

		expect(candidates).toEqual([
			{ tag: "v1.2.0", version: "1.2.0" },
			{ tag: "v1.2.5", version: "1.2.5" },
		])
	})

	it("reads zero-padded components as plain numbers", () => {
		expect(matchVersionTags(["v01.2.0"], "v${version}", any)).toEqual([
			{ tag: "v01.2.0", version: "1.2.0" },
		])
	})

	it("matches date-style tags", () => {
		expect(matchVersionTags(["v2019.01.05", "v2019.02.01"], "v${version}", any)).toEqual([
			{ tag: "v2019.01.05", version: "2019.1.5" },
			{ tag: "v2019.02.01", version: "2019.2.1" },
		])
	})
})

describe("selectHighestTag", () => {
	it("compares versions numerically", () => {
		const winner = selectHighestTag([
			{ tag: "v1.9.0", version: "1.9.0" },
			{ tag: "v1.10.0", version: "1.10.0" },
			{ tag: "v1.2.0", version: "1.2.0" },
		])

		expect(winner?.tag).toBe("v1.10.0")
	})

	it("returns null for no candidates", () => {
		expect(selectHighestTag([])).toBeNull()
	})
})

describe("resolveVersionTemplate", () => {
	const tags = ["v1.3.0", "v1.0.0", "v1.2.0"]

	it("selects the maximum satisfying tag regardless of order", () => {
		const state: PointerState = {
			branch: "v${version}",
			versionConstraint: ">= 1.1.0, < 1.3.0",
		}

		const forward = resolveVersionTemplate(state, tags, between)
		const reversed = resolveVersionTemplate(state, [...tags].reverse(), between)

		expect(forward?.winner?.tag).toBe("v1.2.0")
		expect(reversed?.winner?.tag).toBe("v1.2.0")
	})

	it("records the winner in the branch that held the template", () => {
		const resolution = resolveVersionTemplate(
			{ branch: "v${version}", rel: "pkgs/${version}", versionConstraint: ">= 1.1.0" },
			tags,
			between,
		)

		expect(resolution?.state).toEqual({
			branch: "v1.2.0",
			ref: undefined,
			rel: "pkgs/1.2.0",
			tag: { tag: "v1.2.0", version: "1.2.0" },
			versionConstraint: "= 1.2.0",
		})
	})

	it("records the winner in the ref and clears the branch", () => {
		const resolution = resolveVersionTemplate(
			{ branch: "master", ref: "v${version}", versionConstraint: "*" },
			tags,
			any,
		)

		expect(resolution?.state.ref).toBe("v1.3.0")
		expect(resolution?.state.branch).toBeUndefined()
	})

	it("leaves the state untouched when nothing matches", () => {
		const state: PointerState = { branch: "v${version}", versionConstraint: ">= 2.0.0" }

		const resolution = resolveVersionTemplate(state, tags, new Range(">=2.0.0"))

		expect(resolution).toEqual({ state, template: "v${version}", winner: null })
	})

	it("ignores pointers without a version token", () => {
		expect(
			resolveVersionTemplate({ branch: "main", versionConstraint: "*" }, tags, any),
		).toBeNull()
	})
})
