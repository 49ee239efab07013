import type { AbsolutePath, Result } from "@larder/core"
import {
	copyDirectory,
	IGNORED_DIRS,
	looksLikePackage,
	makeTempDir,
	movePath,
	removePath,
} from "@larder/core"
import { packageStorePath } from "../cache/revision"
import { joinRepoPath } from "../location/rel"
import type { PackageValidator } from "../package/validator"
import { loadResolvedPackage } from "../package/handle"
import type {
	GitLocationError,
	PackageNotFoundError,
	ResolvedGitLocation,
	ResolvedPackage,
} from "../types"

export interface MaterializeInput {
	cloneDir: AbsolutePath
	destinationRoot: AbsolutePath
	location: ResolvedGitLocation
	validator: PackageValidator
}

/**
 * Copies the package subtree of a checked-out clone to
 * `<destinationRoot>/<name>-<commit>`, replacing whatever was there, and
 * validates the result. The clone itself is left untouched.
 */
export async function materializePackage(
	input: MaterializeInput,
): Promise<Result<ResolvedPackage, GitLocationError>> {
	const { cloneDir, destinationRoot, location } = input
	const sourcePath = joinRepoPath(cloneDir, location.rel)

	const isPackage = await looksLikePackage(sourcePath)
	if (!isPackage.ok) {
		return isPackage
	}

	if (!isPackage.value) {
		return { error: packageNotFound(location, sourcePath), ok: false }
	}

	const staging = await makeTempDir(destinationRoot, `.${location.name}-`)
	if (!staging.ok) {
		return staging
	}

	const copied = await copyDirectory(sourcePath, staging.value, IGNORED_DIRS)
	if (!copied.ok) {
		await removePath(staging.value)
		return copied
	}

	const storePath = packageStorePath(destinationRoot, location.name, location.ref)
	const cleared = await removePath(storePath)
	if (!cleared.ok) {
		await removePath(staging.value)
		return cleared
	}

	const moved = await movePath(staging.value, storePath)
	if (!moved.ok) {
		await removePath(staging.value)
		return moved
	}

	const loaded = await loadResolvedPackage(storePath, location)
	if (!loaded.ok) {
		return loaded
	}

	const validated = await input.validator.validate(loaded.value)
	if (!validated.ok) {
		return validated
	}

	return loaded
}

export function packageNotFound(
	location: ResolvedGitLocation,
	sourcePath: AbsolutePath,
): PackageNotFoundError {
	let message = `Package '${location.name}' not found at git: ${location.uri}`
	if (location.branch) message += ` with branch '${location.branch}'`
	if (location.ref) message += ` with ref '${location.ref}'`
	if (location.rel) message += ` at path '${location.rel}'`

	return {
		branch: location.branch,
		message,
		name: location.name,
		path: sourcePath,
		ref: location.ref,
		rel: location.rel,
		type: "package_not_found",
		uri: location.uri,
	}
}
