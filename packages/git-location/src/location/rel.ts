import path from "node:path"
import type { AbsolutePath, Result, ValidationError } from "@larder/core"
import { assertAbsolutePathDirect, manualValidationError } from "@larder/core"

/**
 * Normalises a subpath inside a repository. Empty or "." collapses to
 * undefined; absolute paths and paths escaping the repository are rejected.
 */
export function normalizeRel(
	value: string | undefined,
): Result<string | undefined, ValidationError> {
	if (value === undefined) {
		return { ok: true, value: undefined }
	}

	const trimmed = value.trim()
	if (!trimmed) {
		return { error: manualValidationError("rel", "Package path cannot be empty."), ok: false }
	}

	const cleaned = trimmed.replace(/\\/g, "/")
	if (cleaned.startsWith("/")) {
		return { error: manualValidationError("rel", "Package path must be relative."), ok: false }
	}

	const segments = cleaned.split("/")
	if (segments.some((segment) => segment === "..")) {
		return {
			error: manualValidationError("rel", "Package path must not escape the repository."),
			ok: false,
		}
	}

	const normalized = path.posix.normalize(cleaned).replace(/^\.\/+/, "").replace(/\/+$/, "")
	if (!normalized || normalized === ".") {
		return { ok: true, value: undefined }
	}

	return { ok: true, value: normalized }
}

export function joinRepoPath(repoDir: AbsolutePath, rel: string | undefined): AbsolutePath {
	if (!rel) {
		return repoDir
	}
	return assertAbsolutePathDirect(path.join(repoDir, ...rel.split("/")))
}
