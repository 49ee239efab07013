import { createCloneCache } from "../cache/clone-cache"
import { createTempRoot } from "../cache/temp-root"
import { env } from "../env"
import { createMetadataValidator } from "../package/validator"
import { createExecGitTransport } from "../transport/exec"
import type { GitLocationResolver, GitLocationResolverDeps } from "./resolve"
import { createGitLocationResolver } from "./resolve"

/**
 * Resolver wired to the git executable, a clone root under LARDER_TMPDIR and
 * the metadata validator. Any collaborator can be swapped out.
 */
export function createDefaultGitLocationResolver(
	overrides: Partial<GitLocationResolverDeps> = {},
): GitLocationResolver {
	const transport = overrides.transport ?? createExecGitTransport()
	return createGitLocationResolver({
		cloneCache:
			overrides.cloneCache ??
			createCloneCache({ root: createTempRoot(env.LARDER_TMPDIR), transport }),
		transport,
		validator: overrides.validator ?? createMetadataValidator(),
	})
}
