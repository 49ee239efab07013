import { cp, mkdir, mkdtemp, readFile, rename, rm, stat } from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath } from "../types/branded"
import { assertAbsolutePathDirect } from "../types/coerce"
import type { IoError, Result } from "../types/error"
import { formatError, toRawError } from "../types/error"

export type IoResult<T> = Result<T, IoError>

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>

function ioFailure<T>(
	error: unknown,
	targetPath: AbsolutePath,
	operation: string,
): IoResult<T> {
	return {
		error: {
			message: `${operation} failed for ${targetPath}: ${formatError(error)}`,
			operation,
			path: targetPath,
			rawError: toRawError(error),
			type: "io",
		},
		ok: false,
	}
}

export async function safeStat(targetPath: AbsolutePath): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(error, targetPath, "stat")
	}
}

export async function pathExists(targetPath: AbsolutePath): Promise<IoResult<boolean>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	return { ok: true, value: stats.value !== null }
}

export async function ensureDir(targetPath: AbsolutePath): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return ioFailure(`Expected directory at ${targetPath}.`, targetPath, "mkdir")
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(error, targetPath, "mkdir")
		}
	}

	return { ok: true, value: undefined }
}

export async function makeTempDir(
	parent: AbsolutePath,
	prefix: string,
): Promise<IoResult<AbsolutePath>> {
	const ensured = await ensureDir(parent)
	if (!ensured.ok) {
		return ensured
	}

	try {
		const created = await mkdtemp(path.join(parent, prefix))
		return { ok: true, value: assertAbsolutePathDirect(created) }
	} catch (error) {
		return ioFailure(error, parent, "mkdtemp")
	}
}

export async function readTextFile(targetPath: AbsolutePath): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(error, targetPath, "readFile")
	}
}

export async function removePath(targetPath: AbsolutePath): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, targetPath, "rm")
	}
}

/**
 * Recursively copies `source` into `target`, skipping any entry whose basename
 * is in `ignoredNames`.
 */
export async function copyDirectory(
	source: AbsolutePath,
	target: AbsolutePath,
	ignoredNames: ReadonlySet<string> = new Set(),
): Promise<IoResult<void>> {
	try {
		await cp(source, target, {
			errorOnExist: false,
			filter: (entry) => !ignoredNames.has(path.basename(entry)),
			force: true,
			recursive: true,
			verbatimSymlinks: true,
		})
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, source, "cp")
	}
}

export async function movePath(
	source: AbsolutePath,
	target: AbsolutePath,
): Promise<IoResult<void>> {
	try {
		await rename(source, target)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, source, "rename")
	}
}

function isNotFound(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		(error as { code?: string }).code === "ENOENT"
	)
}
