import path from "node:path"
import { assertAbsolutePathDirect } from "@larder/core"
import { describe, expect, it } from "vitest"
import { FakeTransport } from "../../tests/helpers/fake-transport"
import {
	COMMIT_A,
	COMMIT_B,
	packageRevision,
	REPO_URI,
	withTempDir,
} from "../../tests/helpers/fixtures"
import { validateUri } from "../transport/exec"
import { checkoutAndFinalize, effectivePointer } from "./checkout"

const remote = {
	branches: {
		develop: packageRevision(COMMIT_B, "foo", "1.1.0"),
		master: packageRevision(COMMIT_A, "foo", "1.0.0"),
	},
}

async function cloneInto(dir: string) {
	const transport = new FakeTransport({ [REPO_URI]: remote })
	const uri = validateUri(REPO_URI)
	if (!uri.ok) {
		throw new Error(uri.error.message)
	}
	const cloneDir = assertAbsolutePathDirect(path.join(dir, "clone"))
	await transport.clone(uri.value, cloneDir)
	return { cloneDir, transport }
}

describe("effectivePointer", () => {
	it("prefers the ref over the branch", () => {
		expect(effectivePointer({ branch: "master", ref: "abc", versionConstraint: "*" })).toBe("abc")
		expect(effectivePointer({ branch: "master", versionConstraint: "*" })).toBe("master")
	})
})

describe("checkoutAndFinalize", () => {
	it("keeps a branch that was checked out", async () => {
		await withTempDir(async (dir) => {
			const { cloneDir, transport } = await cloneInto(dir)

			const result = await checkoutAndFinalize(transport, cloneDir, {
				branch: "develop",
				versionConstraint: "*",
			})

			expect(result).toEqual({
				ok: true,
				value: { branch: "develop", ref: COMMIT_B, versionConstraint: "*" },
			})
		})
	})

	it("drops a branch that was overridden by the ref", async () => {
		await withTempDir(async (dir) => {
			const { cloneDir, transport } = await cloneInto(dir)

			const result = await checkoutAndFinalize(transport, cloneDir, {
				branch: "master",
				ref: COMMIT_B,
				versionConstraint: "*",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value.ref).toBe(COMMIT_B)
				expect(result.value.branch).toBeUndefined()
			}
		})
	})

	it("fails on an unknown pointer without resolving a commit", async () => {
		await withTempDir(async (dir) => {
			const { cloneDir, transport } = await cloneInto(dir)

			const result = await checkoutAndFinalize(transport, cloneDir, {
				branch: "missing",
				versionConstraint: "*",
			})

			expect(result.ok).toBe(false)
			expect(transport.callsFor("rev_parse")).toEqual([])
		})
	})
})
