import type { AbsolutePath, Result, ValidationError } from "@larder/core"
import type { CloneCache } from "../cache/clone-cache"
import { findCachedRevision } from "../cache/revision"
import { createGitLocation } from "../location/create"
import { isVersionTemplate } from "../location/substitute"
import { logger } from "../log"
import { loadResolvedPackage } from "../package/handle"
import type { PackageValidator } from "../package/validator"
import type { GitTransport } from "../transport/types"
import type {
	ConstraintSource,
	GitLocation,
	GitLocationError,
	GitLocationOptions,
	PointerState,
	ResolvedGitLocation,
	ResolvedPackage,
} from "../types"
import { parseConstraint } from "../version/constraint"
import { resolveVersionTemplate } from "../version/tags"
import { checkoutAndFinalize, effectivePointer } from "./checkout"
import { materializePackage } from "./materialize"

export interface GitLocationResolverDeps {
	transport: GitTransport
	cloneCache: CloneCache
	validator: PackageValidator
}

export interface GitLocationResolver {
	/** Builds a location whose URI is checked by the resolver's transport. */
	locate(
		name: string,
		versionConstraint: string,
		options: GitLocationOptions,
	): Result<GitLocation, ValidationError>
	resolve(
		location: GitLocation,
		destinationRoot: AbsolutePath,
	): Promise<Result<ResolvedPackage, GitLocationError>>
}

export function createGitLocationResolver(deps: GitLocationResolverDeps): GitLocationResolver {
	return {
		locate: (name, versionConstraint, options) =>
			createGitLocation(name, versionConstraint, options, (uri) =>
				deps.transport.validateUri(uri),
			),
		resolve: (location, destinationRoot) => resolveGitLocation(location, destinationRoot, deps),
	}
}

/**
 * Resolves one git location into a validated package under `destinationRoot`.
 * An explicit ref already materialised there is returned without touching git.
 * The store lookup runs under the repository lock, so a resolution that is
 * still materialising the same ref is never overwritten by a second one.
 */
export async function resolveGitLocation(
	location: GitLocation,
	destinationRoot: AbsolutePath,
	deps: GitLocationResolverDeps,
): Promise<Result<ResolvedPackage, GitLocationError>> {
	return deps.cloneCache.exclusive(location.uri, () =>
		resolveLocked(location, destinationRoot, deps),
	)
}

async function resolveLocked(
	location: GitLocation,
	destinationRoot: AbsolutePath,
	deps: GitLocationResolverDeps,
): Promise<Result<ResolvedPackage, GitLocationError>> {
	const cached = await findCachedRevision(location, destinationRoot)
	if (!cached.ok) {
		return cached
	}

	if (cached.value && location.ref !== undefined) {
		logger.debug(`Using cached ${location.name} at ${cached.value}`)
		return loadCached(cached.value, location, location.ref, deps.validator)
	}

	return resolveFromClone(location, destinationRoot, deps)
}

async function loadCached(
	storePath: AbsolutePath,
	location: GitLocation,
	ref: string,
	validator: PackageValidator,
): Promise<Result<ResolvedPackage, GitLocationError>> {
	const resolved: ResolvedGitLocation = {
		branch: location.branch === ref ? location.branch : undefined,
		constraintSource: constraintSourceOf(location),
		name: location.name,
		ref,
		rel: location.rel,
		uri: location.uri,
		versionConstraint: location.versionConstraint,
	}

	const loaded = await loadResolvedPackage(storePath, resolved)
	if (!loaded.ok) {
		return loaded
	}

	const validated = await validator.validate(loaded.value)
	if (!validated.ok) {
		return validated
	}

	return loaded
}

async function resolveFromClone(
	location: GitLocation,
	destinationRoot: AbsolutePath,
	deps: GitLocationResolverDeps,
): Promise<Result<ResolvedPackage, GitLocationError>> {
	const clone = await deps.cloneCache.acquire(location.uri)
	if (!clone.ok) {
		return clone
	}

	let state: PointerState = {
		branch: location.branch,
		ref: location.ref,
		rel: location.rel,
		versionConstraint: location.versionConstraint,
	}

	if (isVersionTemplate(effectivePointer(state))) {
		const tags = await deps.transport.listTags(clone.value)
		if (!tags.ok) {
			return tags
		}

		const constraintText = location.versionFromMetadata ?? location.versionConstraint
		const range = parseConstraint(constraintText)
		if (!range.ok) {
			return range
		}

		const resolution = resolveVersionTemplate(state, tags.value, range.value)
		if (resolution?.winner) {
			logger.debug(`Using tag ${resolution.winner.tag} for ${location.name}`)
			state = resolution.state
		} else if (resolution) {
			logger.warn(
				`No tag of ${location.uri} matches '${resolution.template}' with version '${constraintText}'.`,
			)
		}
	}

	const finalized = await checkoutAndFinalize(deps.transport, clone.value, state)
	if (!finalized.ok) {
		return finalized
	}

	const resolved: ResolvedGitLocation = {
		branch: finalized.value.branch,
		constraintSource: constraintSourceOf(location),
		name: location.name,
		ref: finalized.value.ref,
		rel: finalized.value.rel,
		tag: finalized.value.tag,
		uri: location.uri,
		versionConstraint: finalized.value.versionConstraint,
	}

	return materializePackage({
		cloneDir: clone.value,
		destinationRoot,
		location: resolved,
		validator: deps.validator,
	})
}

function constraintSourceOf(location: GitLocation): ConstraintSource {
	return location.versionFromMetadata !== undefined ? "metadata" : "request"
}
