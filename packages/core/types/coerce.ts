import path from "node:path"
import type {
	AbsolutePath,
	CommitSha,
	GitUrl,
	NonEmptyString,
	PackageName,
} from "./branded"

export function coerceNonEmpty(value: string): NonEmptyString | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/

export function coercePackageName(value: string): PackageName | null {
	const trimmed = value.trim()
	if (!PACKAGE_NAME_PATTERN.test(trimmed)) return null
	return trimmed as PackageName
}

export function coerceAbsolutePathDirect(value: string): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return path.normalize(trimmed) as AbsolutePath
}

export function assertAbsolutePathDirect(value: string): AbsolutePath {
	const result = coerceAbsolutePathDirect(value)
	if (!result) {
		throw new Error(`Expected absolute path, got: ${value}`)
	}
	return result
}

// scp-like syntax: user@host:path
const SCP_GIT_PATTERN = /^[\w.-]+@[\w.-]+:[^\s]+$/
const URL_GIT_PATTERN = /^(?:git|ssh|https?|file):\/\/[^\s]+$/

/**
 * Accepts the remote forms git itself understands and returns the trimmed
 * input unchanged. Clones are keyed by this exact string.
 */
export function coerceGitUrl(value: string): GitUrl | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	if (SCP_GIT_PATTERN.test(trimmed)) {
		return trimmed as GitUrl
	}

	if (!URL_GIT_PATTERN.test(trimmed)) {
		return null
	}

	let parsed: URL
	try {
		parsed = new URL(trimmed)
	} catch {
		return null
	}

	if (parsed.protocol !== "file:" && parsed.hostname.length === 0) {
		return null
	}

	if (parsed.pathname.length === 0 || parsed.pathname === "/") {
		return null
	}

	return trimmed as GitUrl
}

const COMMIT_SHA_PATTERN = /^[0-9a-f]{40}$/

export function coerceCommitSha(value: string): CommitSha | null {
	const trimmed = value.trim().toLowerCase()
	if (!COMMIT_SHA_PATTERN.test(trimmed)) return null
	return trimmed as CommitSha
}
