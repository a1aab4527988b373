import type { PackageRef } from "../package/types"
import { formatRef, GROUP_KEYS } from "../package/types"
import type { Configuration, Group, RawGroup } from "./types"

/**
 * Serialize a Configuration to JSON.
 * Output is deterministic: keys sorted, package lists sorted by name,
 * machine group lists kept in their configured order.
 */
export function serializeConfiguration(config: Configuration): string {
	return `${JSON.stringify(toConfigurationDocument(config), null, 2)}\n`
}

export function toConfigurationDocument(config: Configuration): Record<string, unknown> {
	const output: Record<string, unknown> = {
		...config.extra,
		groups: serializeGroups(config.groups.values()),
		machines: serializeMachines(config.machines),
		version: config.version,
	}

	return sortKeys(output)
}

function serializeGroups(groups: Iterable<Group>): Record<string, RawGroup> {
	return Object.fromEntries(
		sortByName(groups).map((group) => [group.name, serializeGroup(group)]),
	)
}

function serializeGroup(group: Group): Required<RawGroup> {
	const output: Required<RawGroup> = { brews: [], casks: [], mas: [], taps: [] }
	for (const ref of sortByName(group.packages.values())) {
		output[GROUP_KEYS[ref.kind]].push(formatRef(ref))
	}
	return output
}

function serializeMachines(
	machines: Configuration["machines"],
): Record<string, string[]> {
	return Object.fromEntries(
		[...machines.keys()].sort().map((host) => [host, [...(machines.get(host) ?? [])]]),
	)
}

function sortByName<T extends Pick<PackageRef, "name"> | Pick<Group, "name">>(
	items: Iterable<T>,
): T[] {
	return [...items].sort((left, right) =>
		left.name < right.name ? -1 : left.name > right.name ? 1 : 0,
	)
}

function sortKeys(value: Record<string, unknown>): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(value).sort(([left], [right]) =>
			left < right ? -1 : left > right ? 1 : 0,
		),
	)
}
