export const NAME_TOKEN = "${name}"
export const VERSION_TOKEN = "${version}"

/**
 * Replaces every `${key}` token whose key is in `variables`. Unknown tokens,
 * including `${version}` before tags are known, are left in place.
 */
export function substituteVariables<T extends string | undefined>(
	value: T,
	variables: Readonly<Record<string, string>>,
): T
export function substituteVariables(
	value: string | undefined,
	variables: Readonly<Record<string, string>>,
): string | undefined {
	if (value === undefined) {
		return undefined
	}

	let result = value
	for (const [key, replacement] of Object.entries(variables)) {
		result = result.replaceAll(`\${${key}}`, replacement)
	}
	return result
}

export function isVersionTemplate(value: string | undefined): value is string {
	return value?.includes(VERSION_TOKEN) ?? false
}
