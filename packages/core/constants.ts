/**
 * Canonical filenames used to recognise a package on disk.
 */

/** JSON metadata, preferred when both forms are present */
export const METADATA_JSON_FILENAME = "metadata.json"

/** DSL metadata, read for its literal declarations only */
export const METADATA_RB_FILENAME = "metadata.rb"

/** Package-layout markers, in lookup order */
export const PACKAGE_MARKERS: readonly string[] = [
	METADATA_JSON_FILENAME,
	METADATA_RB_FILENAME,
]

/** Directories never copied out of a clone */
export const IGNORED_DIRS = new Set([".git"])
