import path from "node:path"
import type { AbsolutePath, GitUrl, IoError, Result } from "@larder/core"
import { assertAbsolutePathDirect, pathExists } from "@larder/core"
import { logger } from "../log"
import type { GitTransport } from "../transport/types"
import type { GitError } from "../types"
import type { TempRootProvider } from "./temp-root"

/**
 * Clones shared by every location pointing at the same repository.
 */
export interface CloneCache {
	/** Local clone of `uri`, cloned on first request and reused as-is after that. */
	acquire(uri: GitUrl): Promise<Result<AbsolutePath, GitError | IoError>>
	/** Runs `task` once every earlier task for the same repository has settled. */
	exclusive<T>(uri: GitUrl, task: () => Promise<T>): Promise<T>
}

export interface CloneCacheOptions {
	root: TempRootProvider
	transport: GitTransport
}

export function cloneSlug(uri: string): string {
	return uri.replace(/[/:\\]/g, "-")
}

export function createCloneCache(options: CloneCacheOptions): CloneCache {
	const tails = new Map<string, Promise<void>>()

	return {
		async acquire(uri) {
			const root = await options.root()
			if (!root.ok) {
				return root
			}

			const cloneDir = assertAbsolutePathDirect(path.join(root.value, cloneSlug(uri)))
			const exists = await pathExists(cloneDir)
			if (!exists.ok) {
				return exists
			}

			if (exists.value) {
				logger.debug(`Reusing clone of ${uri} at ${cloneDir}`)
				return { ok: true, value: cloneDir }
			}

			logger.debug(`Cloning ${uri} into ${cloneDir}`)
			const cloned = await options.transport.clone(uri, cloneDir)
			if (!cloned.ok) {
				return cloned
			}

			return { ok: true, value: cloneDir }
		},

		async exclusive(uri, task) {
			const key = cloneSlug(uri)
			const previous = tails.get(key) ?? Promise.resolve()
			const run = previous.then(task)
			const tail = run.then(
				() => undefined,
				() => undefined,
			)
			tails.set(key, tail)

			try {
				return await run
			} finally {
				if (tails.get(key) === tail) {
					tails.delete(key)
				}
			}
		},
	}
}
