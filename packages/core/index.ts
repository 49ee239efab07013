/**
 * @larder/core
 *
 * Shared constants, types, and filesystem utilities for package resolution.
 */

export { IGNORED_DIRS } from "./constants"
export { looksLikePackage, readPackageMetadata } from "./detection/package"
export type { IoResult } from "./io/fs"
export {
	copyDirectory,
	makeTempDir,
	movePath,
	pathExists,
	removePath,
} from "./io/fs"
export type {
	AbsolutePath,
	CommitSha,
	GitUrl,
	NonEmptyString,
	PackageName,
} from "./types/branded"
export { unwrap } from "./types/branded"
export {
	assertAbsolutePathDirect,
	coerceCommitSha,
	coerceGitUrl,
	coerceNonEmpty,
	coercePackageName,
} from "./types/coerce"
export type { MetadataSource, PackageMetadata } from "./types/content"
export type {
	BaseError,
	CoreError,
	IoError,
	NotFoundError,
	ParseError,
	Result,
	ValidationError,
} from "./types/error"
export { manualValidationError, toRawError } from "./types/error"
