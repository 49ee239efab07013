import path from "node:path"
import type { AbsolutePath, IoResult, PackageName } from "@larder/core"
import { assertAbsolutePathDirect, pathExists } from "@larder/core"
import { isVersionTemplate } from "../location/substitute"
import type { GitLocation } from "../types"

/**
 * Where a package resolved at `ref` lives under `destinationRoot`.
 */
export function packageStorePath(
	destinationRoot: AbsolutePath,
	name: PackageName,
	ref: string,
): AbsolutePath {
	return assertAbsolutePathDirect(path.join(destinationRoot, `${name}-${ref}`))
}

/**
 * Store path of an already materialised explicit ref, or null. Branches and
 * version templates never hit: their commit is unknown until checkout.
 */
export async function findCachedRevision(
	location: GitLocation,
	destinationRoot: AbsolutePath,
): Promise<IoResult<AbsolutePath | null>> {
	if (location.ref === undefined || isVersionTemplate(location.ref)) {
		return { ok: true, value: null }
	}

	const storePath = packageStorePath(destinationRoot, location.name, location.ref)
	const exists = await pathExists(storePath)
	if (!exists.ok) {
		return exists
	}

	return { ok: true, value: exists.value ? storePath : null }
}
