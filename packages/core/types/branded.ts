/**
 * Branded types used across core.
 */

declare const NonEmptyStringBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const GitUrlBrand: unique symbol
declare const PackageNameBrand: unique symbol
declare const CommitShaBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>
export type GitUrl = Brand<string, typeof GitUrlBrand>
export type PackageName = Brand<string, typeof PackageNameBrand>
export type CommitSha = Brand<string, typeof CommitShaBrand>

export function unwrap<T extends string>(branded: T): string {
	return branded
}
