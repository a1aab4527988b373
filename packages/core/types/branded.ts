/**
 * Branded types used across core.
 */

declare const NonEmptyStringBrand: unique symbol
declare const PackageNameBrand: unique symbol
declare const GroupNameBrand: unique symbol
declare const HostnameBrand: unique symbol
declare const AbsolutePathBrand: unique symbol
declare const MasIdBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type NonEmptyString = Brand<string, typeof NonEmptyStringBrand>
export type PackageName = Brand<string, typeof PackageNameBrand>
export type GroupName = Brand<string, typeof GroupNameBrand>
export type Hostname = Brand<string, typeof HostnameBrand>
export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>
export type MasId = Brand<number, typeof MasIdBrand>
