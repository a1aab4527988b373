import type { Configuration, GroupName, PackageKind, PackageRef } from "@brewfile/core"
import {
	addPackage,
	assignGroups,
	classify,
	coerceGroupName,
	createGroup,
	formatRef,
	groupsForMachine,
	hasPackage,
} from "@brewfile/core"
import { consola } from "consola"
import type { CommandContext } from "@/src/commands/context"
import { createContext, persistConfiguration, requireConfiguration } from "@/src/commands/context"
import type { GlobalOptions } from "@/src/commands/types"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { formatError } from "@/src/utils/errors"

export const DEFAULT_GROUP = "core"

export interface AddOptions {
	kind?: PackageKind
	group?: string
	install: boolean
}

export interface AddResult {
	ref: PackageRef
	group: GroupName
	installed: boolean
}

export async function addCommand(
	literal: string,
	options: AddOptions & GlobalOptions,
): Promise<void> {
	consola.info("brewfile add")

	try {
		const context = createContext(options)
		const result = await runAdd(context, literal, options)
		printOutcome(result)
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Add failed.")
	}
}

export async function runAdd(
	context: CommandContext,
	literal: string,
	options: AddOptions,
): Promise<CommandResult<AddResult>> {
	let config = await requireConfiguration(context)

	consola.start(`Classifying ${literal}...`)
	const classified = await classify(literal, {
		metadata: context.backend,
		override: options.kind,
	})
	if (!classified.ok) {
		throw new Error(classified.error.message)
	}
	const ref = classified.value

	const target = resolveTargetGroup(config, context, options.group)
	config = target.config

	const alreadyPresent = hasPackage(config, target.group, ref)
	if (alreadyPresent) {
		consola.info(`${formatRef(ref)} is already in group "${target.group}".`)
	} else {
		config = addPackage(config, target.group, ref)
	}

	if (!alreadyPresent || target.assigned) {
		await persistConfiguration(context, config)
	}
	if (!alreadyPresent) {
		consola.success(`Added ${ref.kind} ${formatRef(ref)} to group "${target.group}".`)
	}

	if (!options.install) {
		return CommandResult.completed({ group: target.group, installed: false, ref })
	}

	consola.start(`Installing ${formatRef(ref)}...`)
	const installed = await context.backend.install(ref)
	if (!installed.ok) {
		consola.error(installed.error.message)
		consola.error(`${formatRef(ref)} stays in the configuration; run \`brewfile sync-adopt\` to retry.`)
		return CommandResult.failed()
	}

	consola.success(`Installed ${formatRef(ref)}.`)
	return CommandResult.completed({ group: target.group, installed: true, ref })
}

interface TargetGroup {
	config: Configuration
	group: GroupName
	/** The group was newly assigned to this machine. */
	assigned: boolean
}

/**
 * `--group`, else the machine's first group, else `core`. A machine with no
 * groups gets the chosen group assigned to it.
 */
function resolveTargetGroup(
	config: Configuration,
	context: CommandContext,
	requested: string | undefined,
): TargetGroup {
	const machineGroups = groupsForMachine(config, context.hostname)

	let group: GroupName | null
	if (requested !== undefined) {
		group = coerceGroupName(requested)
		if (!group) {
			throw new Error(`Invalid group name "${requested}".`)
		}
	} else {
		group = machineGroups[0] ?? coerceGroupName(DEFAULT_GROUP)
		if (!group) {
			throw new Error(`Invalid group name "${DEFAULT_GROUP}".`)
		}
	}

	if (machineGroups.length > 0) {
		if (!machineGroups.includes(group)) {
			consola.warn(`Group "${group}" is not assigned to ${context.hostname}.`)
		}
		return { assigned: false, config, group }
	}

	const withGroup = createGroup(config, group)
	const assigned = assignGroups(withGroup, context.hostname, [group])
	if (!assigned.ok) {
		throw new Error(assigned.error.message)
	}
	consola.info(`Assigned group "${group}" to ${context.hostname}.`)
	return { assigned: true, config: assigned.value, group }
}
