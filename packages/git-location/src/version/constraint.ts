import type { Result, ValidationError } from "@larder/core"
import { manualValidationError } from "@larder/core"
import * as semver from "semver"
import { Range } from "semver"

const PESSIMISTIC_CLAUSE = /^~>\s*(\d+)(?:\.(\d+))?(?:\.(\d+))?$/
const OPERATOR_CLAUSE = /^(>=|<=|>|<|=)?\s*(\d+(?:\.\d+){0,2})$/

/**
 * Parses a version constraint into a semver range. Accepts comma separated
 * clauses with `~>`, `=`, `>=`, `>`, `<=`, `<` and short versions, and falls
 * back to node-semver range syntax for anything else. Empty means any version.
 */
export function parseConstraint(input: string): Result<Range, ValidationError> {
	const trimmed = input.trim()
	if (trimmed.length === 0) {
		return { ok: true, value: new Range("*") }
	}

	const clauses = trimmed
		.split(",")
		.map((clause) => clause.trim())
		.filter((clause) => clause.length > 0)
		.map(translateClause)

	const expression = clauses.join(" ")
	if (semver.validRange(expression) === null) {
		return {
			error: manualValidationError(
				"versionConstraint",
				`Invalid version constraint: "${input}".`,
			),
			ok: false,
		}
	}

	return { ok: true, value: new Range(expression) }
}

/**
 * Constraint that admits exactly `version`.
 */
export function exactConstraint(version: string): string {
	return `= ${version}`
}

/**
 * Pads a one or two component version to three components. Returns null for
 * anything that is not a plain numeric version.
 */
export function normalizeVersion(value: string): string | null {
	const trimmed = value.trim()
	if (!/^\d+(?:\.\d+){0,2}$/.test(trimmed)) {
		return semver.valid(trimmed)
	}
	return padVersion(trimmed)
}

function translateClause(clause: string): string {
	const pessimistic = PESSIMISTIC_CLAUSE.exec(clause)
	if (pessimistic) {
		const major = Number(pessimistic[1])
		const minor = pessimistic[2]
		const patch = pessimistic[3]
		if (minor === undefined) {
			return `>=${major}.0.0 <${major + 1}.0.0`
		}
		if (patch === undefined) {
			return `>=${major}.${minor}.0 <${major + 1}.0.0`
		}
		return `>=${major}.${minor}.${patch} <${major}.${Number(minor) + 1}.0`
	}

	const operator = OPERATOR_CLAUSE.exec(clause)
	if (operator) {
		const op = operator[1] ?? "="
		const version = operator[2] ?? ""
		return `${op}${padVersion(version)}`
	}

	return clause
}

function padVersion(version: string): string {
	const parts = version.split(".")
	while (parts.length < 3) {
		parts.push("0")
	}
	return parts.join(".")
}
