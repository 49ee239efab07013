import { z } from "zod"
import type { NonEmptyString } from "../types/branded"
import type { PackageMetadata } from "../types/content"
import type { Result } from "../types/error"

const NonEmptyStringSchema = z
	.string()
	.trim()
	.min(1)
	.transform((value) => value as NonEmptyString)

const MetadataSchema = z.object({
	dependencies: z.record(z.string(), z.string()).optional().default({}),
	description: NonEmptyStringSchema.optional(),
	name: NonEmptyStringSchema,
	version: NonEmptyStringSchema,
})

export function parseMetadataJson(contents: string): Result<PackageMetadata> {
	let parsed: unknown
	try {
		parsed = JSON.parse(contents)
	} catch (error) {
		return {
			error: {
				message: "Invalid JSON in metadata.json.",
				rawError: error instanceof Error ? error : undefined,
				source: "metadata.json",
				type: "parse",
			},
			ok: false,
		}
	}

	const result = MetadataSchema.safeParse(parsed)
	if (!result.success) {
		return {
			error: {
				field: "metadata",
				message: "Metadata validation failed.",
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: { ...result.data, source: "metadata.json" } }
}

const RB_STRING = String.raw`\s*\(?\s*(?:"([^"]*)"|'([^']*)')`
const RB_NAME_PATTERN = new RegExp(String.raw`^\s*name${RB_STRING}`, "m")
const RB_VERSION_PATTERN = new RegExp(String.raw`^\s*version${RB_STRING}`, "m")
const RB_DESCRIPTION_PATTERN = new RegExp(String.raw`^\s*description${RB_STRING}`, "m")
const RB_DEPENDS_PATTERN = new RegExp(
	String.raw`^\s*depends${RB_STRING}(?:\s*,\s*(?:"([^"]*)"|'([^']*)'))?`,
	"gm",
)

/**
 * Reads the literal `name`, `version`, `description` and `depends` calls of a
 * metadata.rb. Anything computed at evaluation time is out of reach.
 */
export function parseMetadataRb(contents: string): Result<PackageMetadata> {
	const name = readRbString(RB_NAME_PATTERN.exec(contents))
	if (!name) {
		return {
			error: {
				field: "name",
				message: "metadata.rb does not declare a name.",
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const version = readRbString(RB_VERSION_PATTERN.exec(contents))
	if (!version) {
		return {
			error: {
				field: "version",
				message: "metadata.rb does not declare a version.",
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const dependencies: Record<string, string> = {}
	for (const match of contents.matchAll(RB_DEPENDS_PATTERN)) {
		const dependency = (match[1] ?? match[2] ?? "").trim()
		if (dependency) {
			dependencies[dependency] = (match[3] ?? match[4] ?? ">= 0.0.0").trim()
		}
	}

	const description = readRbString(RB_DESCRIPTION_PATTERN.exec(contents))

	return {
		ok: true,
		value: {
			dependencies,
			description: description ?? undefined,
			name,
			source: "metadata.rb",
			version,
		},
	}
}

function readRbString(match: RegExpExecArray | null): NonEmptyString | null {
	if (!match) return null
	const value = (match[1] ?? match[2] ?? "").trim()
	return value.length > 0 ? (value as NonEmptyString) : null
}
