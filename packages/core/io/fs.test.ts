import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import { describe, expect, it } from "vitest"
import type { AbsolutePath } from "../types/branded"
import { assertAbsolutePathDirect } from "../types/coerce"
import { copyDirectory, ensureDir, movePath, pathExists, removePath } from "./fs"

async function withTempDir<T>(fn: (dir: AbsolutePath) => Promise<T>): Promise<T> {
	const dir = await mkdtemp(path.join(tmpdir(), "core-fs-"))
	try {
		return await fn(assertAbsolutePathDirect(dir))
	} finally {
		await rm(dir, { force: true, recursive: true })
	}
}

function at(...segments: string[]): AbsolutePath {
	return assertAbsolutePathDirect(path.join(...segments))
}

describe("copyDirectory", () => {
	it("copies nested files and skips ignored names", async () => {
		await withTempDir(async (dir) => {
			const source = at(dir, "source")
			await mkdir(path.join(source, ".git"), { recursive: true })
			await mkdir(path.join(source, "recipes"), { recursive: true })
			await writeFile(path.join(source, ".git", "HEAD"), "ref")
			await writeFile(path.join(source, "recipes", "default.rb"), "# default")

			const result = await copyDirectory(source, at(dir, "target"), new Set([".git"]))

			expect(result).toEqual({ ok: true, value: undefined })
			expect(await readdir(path.join(dir, "target"))).toEqual(["recipes"])
			expect(await readFile(path.join(dir, "target", "recipes", "default.rb"), "utf8")).toBe(
				"# default",
			)
		})
	})
})

describe("movePath", () => {
	it("renames a directory into place", async () => {
		await withTempDir(async (dir) => {
			await mkdir(path.join(dir, "staging"))

			const result = await movePath(at(dir, "staging"), at(dir, "final"))

			expect(result.ok).toBe(true)
			expect(await pathExists(at(dir, "staging"))).toEqual({ ok: true, value: false })
			expect(await pathExists(at(dir, "final"))).toEqual({ ok: true, value: true })
		})
	})

	it("reports a missing source", async () => {
		await withTempDir(async (dir) => {
			const result = await movePath(at(dir, "nope"), at(dir, "final"))

			expect(result.ok).toBe(false)
			if (!result.ok) {
				expect(result.error.operation).toBe("rename")
			}
		})
	})
})

describe("ensureDir", () => {
	it("refuses to replace a file", async () => {
		await withTempDir(async (dir) => {
			await writeFile(path.join(dir, "file"), "x")

			const result = await ensureDir(at(dir, "file"))

			expect(result.ok).toBe(false)
		})
	})
})

describe("removePath", () => {
	it("ignores missing paths", async () => {
		await withTempDir(async (dir) => {
			expect(await removePath(at(dir, "missing"))).toEqual({ ok: true, value: undefined })
		})
	})
})
