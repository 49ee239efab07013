import type { AbsolutePath, Result } from "@larder/core"
import { readPackageMetadata } from "@larder/core"
import type { GitLocationError, ResolvedGitLocation, ResolvedPackage } from "../types"

/**
 * Reads a materialised package directory into a handle.
 */
export async function loadResolvedPackage(
	storePath: AbsolutePath,
	location: ResolvedGitLocation,
): Promise<Result<ResolvedPackage, GitLocationError>> {
	const metadata = await readPackageMetadata(storePath)
	if (!metadata.ok) {
		return metadata
	}

	return {
		ok: true,
		value: {
			commit: location.ref,
			location,
			metadata: metadata.value,
			name: location.name,
			path: storePath,
		},
	}
}
