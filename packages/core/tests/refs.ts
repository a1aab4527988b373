/**
 * Test-only ref builders. These cast strings directly to branded types
 * without validation; only use them with inputs the test controls.
 */

import type { DesiredState } from "../config/types"
import type { PackageRef } from "../package/types"
import type { GroupName, Hostname, MasId, PackageName } from "../types/branded"

export const tap = (name: string): PackageRef => ({ kind: "tap", name: name as PackageName })

export const brew = (name: string): PackageRef => ({
	kind: "formula",
	name: name as PackageName,
})

export const cask = (name: string): PackageRef => ({ kind: "cask", name: name as PackageName })

export const mas = (name: string, id: number): PackageRef => ({
	kind: "mas",
	masId: id as MasId,
	name: name as PackageName,
})

export const group = (name: string): GroupName => name as GroupName

export const host = (name: string): Hostname => name as Hostname

export function desiredOf(refs: PackageRef[], groupName = "core"): DesiredState {
	return {
		groups: [group(groupName)],
		hostname: host("test-host"),
		packages: refs.map((ref) => ({ group: group(groupName), ref })),
	}
}
