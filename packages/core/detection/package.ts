import path from "node:path"
import { METADATA_JSON_FILENAME, METADATA_RB_FILENAME, PACKAGE_MARKERS } from "../constants"
import { pathExists, readTextFile, safeStat } from "../io/fs"
import { parseMetadataJson, parseMetadataRb } from "../parsing/metadata"
import type { AbsolutePath } from "../types/branded"
import { assertAbsolutePathDirect } from "../types/coerce"
import type { PackageMetadata } from "../types/content"
import type { Result } from "../types/error"

/**
 * True when `packagePath` is a directory holding one of the package markers.
 */
export async function looksLikePackage(
	packagePath: AbsolutePath,
): Promise<Result<boolean>> {
	const rootStat = await safeStat(packagePath)
	if (!rootStat.ok) {
		return rootStat
	}

	if (!rootStat.value?.isDirectory()) {
		return { ok: true, value: false }
	}

	for (const marker of PACKAGE_MARKERS) {
		const exists = await pathExists(joinAbsolute(packagePath, marker))
		if (!exists.ok) {
			return exists
		}
		if (exists.value) {
			return { ok: true, value: true }
		}
	}

	return { ok: true, value: false }
}

export async function readPackageMetadata(
	packagePath: AbsolutePath,
): Promise<Result<PackageMetadata>> {
	const jsonPath = joinAbsolute(packagePath, METADATA_JSON_FILENAME)
	const jsonExists = await pathExists(jsonPath)
	if (!jsonExists.ok) {
		return jsonExists
	}

	if (jsonExists.value) {
		const contents = await readTextFile(jsonPath)
		if (!contents.ok) {
			return contents
		}
		return withPath(parseMetadataJson(contents.value), jsonPath)
	}

	const rbPath = joinAbsolute(packagePath, METADATA_RB_FILENAME)
	const rbExists = await pathExists(rbPath)
	if (!rbExists.ok) {
		return rbExists
	}

	if (!rbExists.value) {
		return {
			error: {
				message: `No package metadata found in ${packagePath}.`,
				path: packagePath,
				target: PACKAGE_MARKERS.join(" or "),
				type: "not_found",
			},
			ok: false,
		}
	}

	const contents = await readTextFile(rbPath)
	if (!contents.ok) {
		return contents
	}
	return withPath(parseMetadataRb(contents.value), rbPath)
}

function withPath(
	result: Result<PackageMetadata>,
	filePath: AbsolutePath,
): Result<PackageMetadata> {
	if (result.ok) {
		return result
	}

	if (result.error.type === "parse" || result.error.type === "validation") {
		return { error: { ...result.error, path: filePath }, ok: false }
	}

	return result
}

function joinAbsolute(base: AbsolutePath, ...segments: string[]): AbsolutePath {
	return assertAbsolutePathDirect(path.join(base, ...segments))
}
