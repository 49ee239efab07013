/**
 * Shared fixtures for resolver tests.
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import type { AbsolutePath } from "@larder/core"
import { assertAbsolutePathDirect } from "@larder/core"
import type { FakeRevision } from "./fake-transport"

export const COMMIT_A = "a".repeat(40)
export const COMMIT_B = "b".repeat(40)
export const COMMIT_C = "c".repeat(40)
export const COMMIT_D = "d".repeat(40)

export const REPO_URI = "https://git.example.test/team/foo.git"

/**
 * Creates a temporary directory, runs the callback, and removes it afterwards.
 */
export async function withTempDir<T>(fn: (dir: AbsolutePath) => Promise<T>): Promise<T> {
	const dir = await mkdtemp(path.join(tmpdir(), "larder-test-"))
	try {
		return await fn(assertAbsolutePathDirect(dir))
	} finally {
		await rm(dir, { force: true, recursive: true })
	}
}

export function metadataJson(name: string, version: string): string {
	return JSON.stringify({ name, version })
}

/**
 * A revision whose package sits at `prefix` (the repository root by default).
 */
export function packageRevision(
	commit: string,
	name: string,
	version: string,
	prefix = "",
): FakeRevision {
	const base = prefix ? `${prefix}/` : ""
	return {
		commit,
		files: {
			[`${base}metadata.json`]: metadataJson(name, version),
			[`${base}README.md`]: `# ${name}\n`,
		},
	}
}

export async function writePackageDir(
	dir: string,
	name: string,
	version: string,
): Promise<void> {
	await mkdir(dir, { recursive: true })
	await writeFile(path.join(dir, "metadata.json"), metadataJson(name, version))
}
