import { tmpdir } from "node:os"
import type { AbsolutePath, IoResult } from "@larder/core"
import { assertAbsolutePathDirect, makeTempDir } from "@larder/core"

export type TempRootProvider = () => Promise<IoResult<AbsolutePath>>

/**
 * A temporary directory created on first use and reused afterwards. A failed
 * creation is not remembered, so the next call tries again.
 */
export function createTempRoot(base?: string, prefix = "larder-"): TempRootProvider {
	let pending: Promise<IoResult<AbsolutePath>> | undefined

	return () => {
		if (!pending) {
			const attempt = makeTempDir(assertAbsolutePathDirect(base ?? tmpdir()), prefix)
			pending = attempt.then((result) => {
				if (!result.ok) {
					pending = undefined
				}
				return result
			})
		}
		return pending
	}
}
