import type { LockEntry } from "../types"

interface DisplayableLocation {
	readonly uri: string
	readonly ref?: string
	readonly branch?: string
	readonly rel?: string
}

export function describeLocation(location: DisplayableLocation): string {
	let description = `git: '${location.uri}'`
	if (location.branch) description += ` with branch: '${location.branch}'`
	if (location.ref) description += ` at ref: '${location.ref}'`
	return description
}

/**
 * Lockfile entry for a location. Empty fields are omitted.
 */
export function toLockEntry(location: DisplayableLocation): LockEntry {
	const entry: LockEntry = { type: "git", value: location.uri }
	if (location.branch) entry.branch = location.branch
	if (location.ref) entry.ref = location.ref
	if (location.rel) entry.rel = location.rel
	return entry
}
