import type { Result } from "@larder/core"
import { unwrap } from "@larder/core"
import type { ContentValidationError, ContentValidationReason, ResolvedPackage } from "../types"
import { normalizeVersion, parseConstraint } from "../version/constraint"

export interface PackageValidator {
	validate(pkg: ResolvedPackage): Promise<Result<void, ContentValidationError>>
}

/**
 * Checks that the metadata names the requested package and that its version
 * satisfies the location's constraint.
 */
export function createMetadataValidator(): PackageValidator {
	return {
		async validate(pkg) {
			const { metadata } = pkg
			if (unwrap(metadata.name) !== unwrap(pkg.name)) {
				return failure(
					pkg,
					"name_mismatch",
					`Expected package '${pkg.name}' but ${metadata.source} at ${pkg.path} declares '${metadata.name}'.`,
				)
			}

			const version = normalizeVersion(metadata.version)
			if (!version) {
				return failure(
					pkg,
					"invalid_version",
					`Package '${pkg.name}' declares an invalid version '${metadata.version}'.`,
				)
			}

			const range = parseConstraint(pkg.location.versionConstraint)
			if (!range.ok || !range.value.test(version)) {
				return failure(
					pkg,
					"version_mismatch",
					`Package '${pkg.name}' version ${version} does not satisfy '${pkg.location.versionConstraint}'.`,
				)
			}

			return { ok: true, value: undefined }
		},
	}
}

function failure(
	pkg: ResolvedPackage,
	reason: ContentValidationReason,
	message: string,
): Result<void, ContentValidationError> {
	return {
		error: {
			message,
			name: pkg.name,
			path: pkg.path,
			reason,
			type: "content_validation",
		},
		ok: false,
	}
}
