import type { MasId, PackageName } from "../types/branded"

export type PackageKind = "tap" | "formula" | "cask" | "mas"

/**
 * Kinds in dependency order: taps provide formulas and casks, so they come
 * first in every plan and in every install run.
 */
export const PACKAGE_KINDS: readonly PackageKind[] = ["tap", "formula", "cask", "mas"]

export type HomebrewRef = {
	readonly kind: "tap" | "formula" | "cask"
	readonly name: PackageName
}

export type MasRef = {
	readonly kind: "mas"
	readonly name: PackageName
	readonly masId: MasId
}

export type PackageRef = HomebrewRef | MasRef

/** Configuration-file key holding each kind inside a group. */
export type GroupKey = "taps" | "brews" | "casks" | "mas"

export const GROUP_KEYS: Readonly<Record<PackageKind, GroupKey>> = {
	cask: "casks",
	formula: "brews",
	mas: "mas",
	tap: "taps",
}

export const KIND_LABELS: Readonly<Record<PackageKind, string>> = {
	cask: "Casks",
	formula: "Formulas",
	mas: "App Store apps",
	tap: "Taps",
}

const KIND_RANK: Readonly<Record<PackageKind, number>> = {
	cask: 2,
	formula: 1,
	mas: 3,
	tap: 0,
}

/** Identity of a ref; the App Store id is not part of it. */
export function refKey(ref: Pick<PackageRef, "kind" | "name">): string {
	return `${ref.kind}:${ref.name}`
}

export function sameRef(
	left: Pick<PackageRef, "kind" | "name">,
	right: Pick<PackageRef, "kind" | "name">,
): boolean {
	return left.kind === right.kind && left.name === right.name
}

export function compareRefs(
	left: Pick<PackageRef, "kind" | "name">,
	right: Pick<PackageRef, "kind" | "name">,
): number {
	const rank = KIND_RANK[left.kind] - KIND_RANK[right.kind]
	if (rank !== 0) {
		return rank
	}

	if (left.name < right.name) return -1
	if (left.name > right.name) return 1
	return 0
}

export function sortRefs<T extends Pick<PackageRef, "kind" | "name">>(
	refs: Iterable<T>,
): T[] {
	return [...refs].sort(compareRefs)
}

/** Literal form used in the configuration file and on the command line. */
export function formatRef(ref: PackageRef): string {
	return ref.kind === "mas" ? `${ref.name}::${ref.masId}` : ref.name
}
