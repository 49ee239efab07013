import * as semver from "semver"
import type { Range } from "semver"
import { isVersionTemplate, VERSION_TOKEN } from "../location/substitute"
import type { PointerState, TagCandidate } from "../types"
import { exactConstraint } from "./constraint"

const VERSION_CAPTURE = "([0-9]+\\.[0-9]+\\.[0-9]+)"

/**
 * Compiles a version template such as `v${version}` into a pattern matching a
 * whole tag name. Only the first `${version}` captures; everything else is
 * matched literally.
 */
export function buildTagPattern(template: string): RegExp {
	const index = template.indexOf(VERSION_TOKEN)
	if (index === -1) {
		return new RegExp(`^${escapeRegExp(template)}$`)
	}

	const prefix = template.slice(0, index)
	const suffix = template.slice(index + VERSION_TOKEN.length)
	return new RegExp(`^${escapeRegExp(prefix)}${VERSION_CAPTURE}${escapeRegExp(suffix)}$`)
}

/**
 * Tags matching `template` whose version satisfies `range`, in input order.
 */
export function matchVersionTags(
	tags: readonly string[],
	template: string,
	range: Range,
): TagCandidate[] {
	const pattern = buildTagPattern(template)
	const candidates: TagCandidate[] = []

	for (const tag of tags) {
		const match = pattern.exec(tag)
		const captured = match?.[1]
		if (!captured) continue

		// loose parsing reads zero-padded components such as 2019.01.05
		const version = semver.parse(captured, { loose: true })
		if (!version) continue
		if (!range.test(version)) continue

		candidates.push({ tag, version: version.version })
	}

	return candidates
}

/**
 * Highest version among `candidates`; the first one wins on equal versions.
 */
export function selectHighestTag(candidates: readonly TagCandidate[]): TagCandidate | null {
	let best: TagCandidate | null = null
	for (const candidate of candidates) {
		if (!best || semver.gt(candidate.version, best.version)) {
			best = candidate
		}
	}
	return best
}

export interface TemplateResolution {
	readonly state: PointerState
	readonly template: string
	readonly winner: TagCandidate | null
}

/**
 * Resolves a `${version}` template in the effective pointer against `tags`.
 * The winner replaces whichever of ref/branch held the template and the other
 * field is cleared. With no winner the state is returned unchanged.
 */
export function resolveVersionTemplate(
	state: PointerState,
	tags: readonly string[],
	range: Range,
): TemplateResolution | null {
	const field = state.ref !== undefined ? "ref" : "branch"
	const template = state[field]
	if (!isVersionTemplate(template)) {
		return null
	}

	const winner = selectHighestTag(matchVersionTags(tags, template, range))
	if (!winner) {
		return { state, template, winner: null }
	}

	const rel = state.rel?.replaceAll(VERSION_TOKEN, winner.version)
	const next: PointerState =
		field === "ref"
			? {
					branch: undefined,
					ref: winner.tag,
					rel,
					tag: winner,
					versionConstraint: exactConstraint(winner.version),
				}
			: {
					branch: winner.tag,
					ref: undefined,
					rel,
					tag: winner,
					versionConstraint: exactConstraint(winner.version),
				}

	return { state: next, template, winner }
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}
