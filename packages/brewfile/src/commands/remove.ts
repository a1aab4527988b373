import type { Configuration, GroupName, PackageRef } from "@brewfile/core"
import {
	coerceGroupName,
	findPackage,
	formatRef,
	isQueryable,
	refKey,
	removePackage,
	removePackageEverywhere,
	sortRefs,
} from "@brewfile/core"
import { consola } from "consola"
import type { CommandContext } from "@/src/commands/context"
import { createContext, persistConfiguration, requireConfiguration } from "@/src/commands/context"
import type { GlobalOptions } from "@/src/commands/types"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { formatError } from "@/src/utils/errors"

export interface RemoveOptions {
	group?: string
	keepInstalled: boolean
}

export interface RemoveResult {
	refs: PackageRef[]
	groups: GroupName[]
	uninstalled: PackageRef[]
}

export async function removeCommand(
	literal: string,
	options: RemoveOptions & GlobalOptions,
): Promise<void> {
	consola.info("brewfile remove")

	try {
		const context = createContext(options)
		const result = await runRemove(context, literal, options)
		printOutcome(result)
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Remove failed.")
	}
}

/**
 * Uninstall first, then drop the ref from the configuration. A failed
 * uninstall keeps that ref, and any not yet reached, in the configuration;
 * refs already uninstalled are still removed.
 */
export async function runRemove(
	context: CommandContext,
	literal: string,
	options: RemoveOptions,
): Promise<CommandResult<RemoveResult>> {
	const config = await requireConfiguration(context)

	let group: GroupName | null = null
	if (options.group !== undefined) {
		group = coerceGroupName(options.group)
		if (!group) {
			throw new Error(`Invalid group name "${options.group}".`)
		}
	}

	const locations = findPackage(config, literal).filter(
		(location) => group === null || location.group === group,
	)
	if (locations.length === 0) {
		const where = group ? `group "${group}"` : "the configuration"
		return CommandResult.unchanged(`"${literal.trim()}" is not in ${where}.`)
	}

	const refs = sortRefs(uniqueRefs(locations.map((location) => location.ref)))

	const uninstalled: PackageRef[] = []
	if (!options.keepInstalled) {
		consola.start("Reading installed packages...")
		const actual = await context.backend.currentInventory()
		if (!actual.ok) {
			throw new Error(actual.error.message)
		}
		const installed = new Set(actual.value.packages.map(refKey))

		for (const ref of refs) {
			if (!isQueryable(ref.kind, actual.value.capabilities)) {
				consola.warn(`Cannot check ${formatRef(ref)}: mas is not installed. Leaving it installed.`)
				continue
			}
			if (!installed.has(refKey(ref))) {
				continue
			}

			consola.start(`Uninstalling ${formatRef(ref)}...`)
			const result = await context.backend.uninstall(ref)
			if (!result.ok) {
				consola.error(result.error.message)
				consola.error(`Keeping ${formatRef(ref)} in the configuration.`)
				if (uninstalled.length > 0) {
					const partial = removeRefs(config, uninstalled, group)
					await persistConfiguration(context, partial.config)
					for (const done of uninstalled) {
						consola.success(
							`Removed ${done.kind} ${formatRef(done)} from ${partial.groups.join(", ")}.`,
						)
					}
				}
				return CommandResult.failed()
			}
			uninstalled.push(ref)
		}
	}

	const removed = removeRefs(config, refs, group)
	await persistConfiguration(context, removed.config)
	for (const ref of refs) {
		consola.success(`Removed ${ref.kind} ${formatRef(ref)} from ${removed.groups.join(", ")}.`)
	}

	return CommandResult.completed({ groups: removed.groups, refs, uninstalled })
}

function removeRefs(
	config: Configuration,
	refs: readonly PackageRef[],
	group: GroupName | null,
): { config: Configuration; groups: GroupName[] } {
	let updated = config
	const groups: GroupName[] = []
	for (const ref of refs) {
		if (group) {
			updated = removePackage(updated, group, ref)
			if (!groups.includes(group)) {
				groups.push(group)
			}
			continue
		}

		const result = removePackageEverywhere(updated, ref)
		updated = result.config
		for (const name of result.groups) {
			if (!groups.includes(name)) {
				groups.push(name)
			}
		}
	}
	return { config: updated, groups }
}

function uniqueRefs(refs: readonly PackageRef[]): PackageRef[] {
	const seen = new Map<string, PackageRef>()
	for (const ref of refs) {
		if (!seen.has(refKey(ref))) {
			seen.set(refKey(ref), ref)
		}
	}
	return [...seen.values()]
}
