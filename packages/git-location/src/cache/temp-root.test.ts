import { stat } from "node:fs/promises"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { withTempDir } from "../../tests/helpers/fixtures"
import { createTempRoot } from "./temp-root"

describe("createTempRoot", () => {
	it("creates one directory and reuses it", async () => {
		await withTempDir(async (dir) => {
			const root = createTempRoot(dir, "clones-")

			const first = await root()
			const second = await root()

			expect(first.ok).toBe(true)
			expect(second).toEqual(first)
			if (first.ok) {
				expect(path.dirname(first.value)).toBe(dir)
				expect(path.basename(first.value).startsWith("clones-")).toBe(true)
				expect((await stat(first.value)).isDirectory()).toBe(true)
			}
		})
	})
})
