import { compareRefs, refKey } from "../package/types"
import type { Hostname } from "../types/branded"
import type { Configuration, DesiredPackage, DesiredState } from "./types"

/**
 * Union the groups assigned to a machine into its desired package set.
 * An unknown hostname desires nothing.
 */
export function resolveMachine(config: Configuration, hostname: Hostname): DesiredState {
	const groups = config.machines.get(hostname) ?? []
	const packages = new Map<string, DesiredPackage>()

	for (const groupName of groups) {
		const group = config.groups.get(groupName)
		if (!group) {
			continue
		}

		for (const ref of group.packages.values()) {
			const key = refKey(ref)
			if (!packages.has(key)) {
				packages.set(key, { group: groupName, ref })
			}
		}
	}

	return {
		groups,
		hostname,
		packages: [...packages.values()].sort((left, right) =>
			compareRefs(left.ref, right.ref),
		),
	}
}
