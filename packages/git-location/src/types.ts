import type {
	AbsolutePath,
	BaseError,
	GitUrl,
	IoError,
	NotFoundError,
	PackageMetadata,
	PackageName,
	ParseError,
	ValidationError,
} from "@larder/core"

// =============================================================================
// REQUEST
// =============================================================================

/**
 * Raw options as written next to a dependency declaration.
 */
export interface GitLocationOptions {
	git: string
	ref?: string
	branch?: string
	/** Same as branch; branch wins when both are given. */
	tag?: string
	rel?: string
	/** Version read from the package's own metadata, used for tag matching when set. */
	versionFromMetadata?: string
}

export type ConstraintSource = "request" | "metadata"

/**
 * A validated git location with `${name}` already substituted. Fields that
 * still contain `${version}` are templates resolved against the repository tags.
 */
export interface GitLocation {
	readonly name: PackageName
	readonly versionConstraint: string
	readonly uri: GitUrl
	readonly ref?: string
	readonly branch: string
	readonly rel?: string
	readonly versionFromMetadata?: string
}

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * A tag whose name matched a version template.
 */
export interface TagCandidate {
	readonly tag: string
	readonly version: string
}

/**
 * Addressing fields while a location is being resolved. `ref` wins over
 * `branch` as the checkout pointer.
 */
export interface PointerState {
	readonly ref?: string
	readonly branch?: string
	readonly rel?: string
	readonly versionConstraint: string
	readonly tag?: TagCandidate
}

/**
 * What was actually checked out. `ref` is the commit at HEAD after checkout,
 * or the explicit ref a cached store entry was found under.
 */
export interface ResolvedGitLocation {
	readonly name: PackageName
	readonly uri: GitUrl
	readonly versionConstraint: string
	readonly constraintSource: ConstraintSource
	readonly ref: string
	readonly branch?: string
	readonly rel?: string
	readonly tag?: TagCandidate
}

export interface ResolvedPackage {
	readonly name: PackageName
	readonly commit: string
	readonly path: AbsolutePath
	readonly metadata: PackageMetadata
	readonly location: ResolvedGitLocation
}

export interface LockEntry {
	type: "git"
	value: string
	branch?: string
	ref?: string
	rel?: string
}

// =============================================================================
// ERRORS
// =============================================================================

export type GitOperation = "clone" | "checkout" | "list_tags" | "rev_parse"

export type GitError = BaseError & {
	type: "git"
	operation: GitOperation
	source: string
	stderr?: string
}

export type PackageNotFoundError = BaseError & {
	type: "package_not_found"
	name: PackageName
	uri: GitUrl
	branch?: string
	ref?: string
	rel?: string
	path: AbsolutePath
}

export type ContentValidationReason = "name_mismatch" | "version_mismatch" | "invalid_version"

export type ContentValidationError = BaseError & {
	type: "content_validation"
	name: PackageName
	path: AbsolutePath
	reason: ContentValidationReason
}

export type GitLocationError =
	| GitError
	| PackageNotFoundError
	| ContentValidationError
	| ValidationError
	| ParseError
	| IoError
	| NotFoundError
