import type { NonEmptyString } from "./branded"

export type MetadataSource = "metadata.json" | "metadata.rb"

export type PackageMetadata = {
	name: NonEmptyString
	version: NonEmptyString
	description?: NonEmptyString
	dependencies: Record<string, string>
	source: MetadataSource
}
