import type { PackageRef } from "../package/types"
import { refKey } from "../package/types"
import type { GroupName, Hostname } from "../types/branded"
import type { ConfigSchemaError, Result } from "../types/error"
import type { Configuration, Group } from "./types"
import { DEFAULT_CONFIG_VERSION } from "./types"

/**
 * Pure transformation functions for Configuration.
 * These return new Configuration instances - no mutation.
 */

export function createEmptyConfiguration(): Configuration {
	return {
		extra: {},
		groups: new Map<GroupName, Group>(),
		machines: new Map<Hostname, readonly GroupName[]>(),
		version: DEFAULT_CONFIG_VERSION,
	}
}

/**
 * Ensure a group exists. Returns the same instance when it already does.
 */
export function createGroup(config: Configuration, name: GroupName): Configuration {
	if (config.groups.has(name)) {
		return config
	}

	const groups = new Map(config.groups)
	groups.set(name, { name, packages: new Map() })
	return { ...config, groups }
}

/**
 * Add a ref to a group, creating the group on first reference.
 */
export function addPackage(
	config: Configuration,
	groupName: GroupName,
	ref: PackageRef,
): Configuration {
	const withGroup = createGroup(config, groupName)
	const group = withGroup.groups.get(groupName)
	const key = refKey(ref)
	if (!group || group.packages.has(key)) {
		return withGroup
	}

	const packages = new Map(group.packages)
	packages.set(key, ref)
	return replaceGroup(withGroup, { ...group, packages })
}

/**
 * Remove a ref from a group. The group stays, even when empty, so machine
 * assignments keep pointing at it.
 */
export function removePackage(
	config: Configuration,
	groupName: GroupName,
	ref: Pick<PackageRef, "kind" | "name">,
): Configuration {
	const group = config.groups.get(groupName)
	const key = refKey(ref)
	if (!group || !group.packages.has(key)) {
		return config
	}

	const packages = new Map(group.packages)
	packages.delete(key)
	return replaceGroup(config, { ...group, packages })
}

export interface RemoveEverywhereResult {
	config: Configuration
	groups: GroupName[]
}

/**
 * Remove a ref from every group holding it.
 */
export function removePackageEverywhere(
	config: Configuration,
	ref: Pick<PackageRef, "kind" | "name">,
): RemoveEverywhereResult {
	let updated = config
	const groups: GroupName[] = []
	for (const group of config.groups.values()) {
		if (group.packages.has(refKey(ref))) {
			updated = removePackage(updated, group.name, ref)
			groups.push(group.name)
		}
	}
	return { config: updated, groups }
}

export function hasPackage(
	config: Configuration,
	groupName: GroupName,
	ref: Pick<PackageRef, "kind" | "name">,
): boolean {
	return config.groups.get(groupName)?.packages.has(refKey(ref)) ?? false
}

export interface PackageLocation {
	group: GroupName
	ref: PackageRef
}

/**
 * Find every configured ref with the given name or literal, in any group.
 * `Name::Id` matches the App Store app called Name.
 */
export function findPackage(config: Configuration, literal: string): PackageLocation[] {
	const trimmed = literal.trim()
	const separator = trimmed.lastIndexOf("::")
	const name = separator >= 0 ? trimmed.slice(0, separator).trim() : trimmed

	const found: PackageLocation[] = []
	for (const group of config.groups.values()) {
		for (const ref of group.packages.values()) {
			if (ref.name !== name) {
				continue
			}
			if (separator >= 0 && ref.kind !== "mas") {
				continue
			}
			found.push({ group: group.name, ref })
		}
	}
	return found
}

export function groupsForMachine(
	config: Configuration,
	hostname: Hostname,
): readonly GroupName[] {
	return config.machines.get(hostname) ?? []
}

/**
 * Set the groups assigned to a machine. Every group must exist.
 */
export function assignGroups(
	config: Configuration,
	hostname: Hostname,
	groupNames: readonly GroupName[],
): Result<Configuration, ConfigSchemaError> {
	const assigned: GroupName[] = []
	for (const name of groupNames) {
		if (!config.groups.has(name)) {
			return {
				error: {
					field: `machines.${hostname}`,
					message: `Group "${name}" does not exist.`,
					source: "manual",
					type: "config_schema",
				},
				ok: false,
			}
		}
		if (!assigned.includes(name)) {
			assigned.push(name)
		}
	}

	const machines = new Map(config.machines)
	machines.set(hostname, assigned)
	return { ok: true, value: { ...config, machines } }
}

function replaceGroup(config: Configuration, group: Group): Configuration {
	const groups = new Map(config.groups)
	groups.set(group.name, group)
	return { ...config, groups }
}
