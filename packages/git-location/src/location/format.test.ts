import { describe, expect, it } from "vitest"
import { describeLocation, toLockEntry } from "./format"

const uri = "https://git.example.test/team/foo.git"

describe("describeLocation", () => {
	it("lists branch and ref when present", () => {
		expect(describeLocation({ branch: "main", ref: "abc123", uri })).toBe(
			`git: '${uri}' with branch: 'main' at ref: 'abc123'`,
		)
		expect(describeLocation({ uri })).toBe(`git: '${uri}'`)
	})
})

describe("toLockEntry", () => {
	it("omits empty fields", () => {
		expect(toLockEntry({ ref: "abc123", uri })).toEqual({ ref: "abc123", type: "git", value: uri })
		expect(toLockEntry({ branch: "v1.2.0", ref: "abc123", rel: "pkg", uri })).toEqual({
			branch: "v1.2.0",
			ref: "abc123",
			rel: "pkg",
			type: "git",
			value: uri,
		})
	})
})
