import type { GitUrl, Result, ValidationError } from "@larder/core"
import { coercePackageName, manualValidationError } from "@larder/core"
import type { GitLocation, GitLocationOptions } from "../types"
import { parseConstraint } from "../version/constraint"
import { normalizeRel } from "./rel"
import { substituteVariables } from "./substitute"

export const DEFAULT_BRANCH = "master"

export type UriValidator = (uri: string) => Result<GitUrl, ValidationError>

/**
 * Builds a git location for one dependency. `${name}` is substituted in
 * `branch`, `ref` and `rel` here, before anything touches the network.
 */
export function createGitLocation(
	name: string,
	versionConstraint: string,
	options: GitLocationOptions,
	validateUri: UriValidator,
): Result<GitLocation, ValidationError> {
	const packageName = coercePackageName(name)
	if (!packageName) {
		return {
			error: manualValidationError("name", `Invalid package name: "${name}".`),
			ok: false,
		}
	}

	const constraint = parseConstraint(versionConstraint)
	if (!constraint.ok) {
		return constraint
	}

	if (options.versionFromMetadata !== undefined) {
		const metadataConstraint = parseConstraint(options.versionFromMetadata)
		if (!metadataConstraint.ok) {
			return {
				error: { ...metadataConstraint.error, field: "versionFromMetadata" },
				ok: false,
			}
		}
	}

	const variables = { name: packageName }
	const branch = substituteVariables(
		options.branch ?? options.tag ?? DEFAULT_BRANCH,
		variables,
	)
	const ref = substituteVariables(options.ref, variables)
	const rel = normalizeRel(substituteVariables(options.rel, variables))
	if (!rel.ok) {
		return rel
	}

	if (ref !== undefined && ref.trim().length === 0) {
		return { error: manualValidationError("ref", "ref cannot be empty."), ok: false }
	}

	if (branch.trim().length === 0) {
		return { error: manualValidationError("branch", "branch cannot be empty."), ok: false }
	}

	const uri = validateUri(options.git)
	if (!uri.ok) {
		return uri
	}

	return {
		ok: true,
		value: {
			branch,
			name: packageName,
			ref,
			rel: rel.value,
			uri: uri.value,
			versionConstraint: versionConstraint.trim(),
			versionFromMetadata: options.versionFromMetadata?.trim(),
		},
	}
}
