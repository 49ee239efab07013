/**
 * @larder/git-location
 *
 * Resolves a dependency hosted in a git repository into a validated package
 * directory, addressed by commit, branch or version-templated tag.
 */

export type { CloneCache, CloneCacheOptions } from "./src/cache/clone-cache"
export { cloneSlug, createCloneCache } from "./src/cache/clone-cache"
export { findCachedRevision, packageStorePath } from "./src/cache/revision"
export type { TempRootProvider } from "./src/cache/temp-root"
export { createTempRoot } from "./src/cache/temp-root"
export type { Env } from "./src/env"
export { env, parseEnv } from "./src/env"
export type { UriValidator } from "./src/location/create"
export { createGitLocation, DEFAULT_BRANCH } from "./src/location/create"
export { describeLocation, toLockEntry } from "./src/location/format"
export { joinRepoPath, normalizeRel } from "./src/location/rel"
export {
	isVersionTemplate,
	NAME_TOKEN,
	substituteVariables,
	VERSION_TOKEN,
} from "./src/location/substitute"
export { logger } from "./src/log"
export { loadResolvedPackage } from "./src/package/handle"
export type { PackageValidator } from "./src/package/validator"
export { createMetadataValidator } from "./src/package/validator"
export type { FinalizedPointer } from "./src/resolve/checkout"
export { checkoutAndFinalize, effectivePointer } from "./src/resolve/checkout"
export { createDefaultGitLocationResolver } from "./src/resolve/defaults"
export type { MaterializeInput } from "./src/resolve/materialize"
export { materializePackage, packageNotFound } from "./src/resolve/materialize"
export type { GitLocationResolver, GitLocationResolverDeps } from "./src/resolve/resolve"
export { createGitLocationResolver, resolveGitLocation } from "./src/resolve/resolve"
export type {
	ExecGitTransportOptions,
	GitRunner,
	GitRunOptions,
} from "./src/transport/exec"
export { createExecGitTransport, validateUri } from "./src/transport/exec"
export type { GitTransport } from "./src/transport/types"
export type {
	ConstraintSource,
	ContentValidationError,
	ContentValidationReason,
	GitError,
	GitLocation,
	GitLocationError,
	GitLocationOptions,
	GitOperation,
	LockEntry,
	PackageNotFoundError,
	PointerState,
	ResolvedGitLocation,
	ResolvedPackage,
	TagCandidate,
} from "./src/types"
export { exactConstraint, normalizeVersion, parseConstraint } from "./src/version/constraint"
export type { TemplateResolution } from "./src/version/tags"
export {
	buildTagPattern,
	matchVersionTags,
	resolveVersionTemplate,
	selectHighestTag,
} from "./src/version/tags"
