import type { Configuration, GroupName } from "@brewfile/core"
import {
	assignGroups,
	coerceGroupName,
	createEmptyConfiguration,
	createGroup,
	groupsForMachine,
} from "@brewfile/core"
import { isCancel, multiselect } from "@clack/prompts"
import { consola } from "consola"
import type { CommandContext } from "@/src/commands/context"
import { createContext, persistConfiguration } from "@/src/commands/context"
import type { GlobalOptions } from "@/src/commands/types"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { loadConfiguration } from "@/src/core/config/store"
import { formatError } from "@/src/utils/errors"

export const INITIAL_GROUP = "core"

export interface InitOptions {
	groups?: string
	nonInteractive: boolean
}

export interface InitResult {
	created: boolean
	groups: GroupName[]
}

export async function initCommand(options: InitOptions & GlobalOptions): Promise<void> {
	consola.info("brewfile init")

	try {
		const context = createContext(options)
		const result = await runInit(context, options)
		printOutcome(result)
		if (result.status === "completed" && result.value.created) {
			consola.info("Next: `brewfile add <package>` or `brewfile sync-adopt`.")
		}
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Init failed.")
	}
}

export async function runInit(
	context: CommandContext,
	options: InitOptions,
): Promise<CommandResult<InitResult>> {
	consola.info(`Configuring machine ${context.hostname}`)

	let config: Configuration
	let created = false
	const loaded = await loadConfiguration(context.configPath)
	if (loaded.ok) {
		config = loaded.value
	} else if (loaded.error.type === "config_not_found") {
		config = createEmptyConfiguration()
		created = true
	} else {
		throw new Error(loaded.error.message)
	}

	if (config.groups.size === 0) {
		const core = coerceGroupName(INITIAL_GROUP)
		if (!core) {
			throw new Error(`Invalid group name "${INITIAL_GROUP}".`)
		}
		const assigned = assignGroups(createGroup(config, core), context.hostname, [core])
		if (!assigned.ok) {
			throw new Error(assigned.error.message)
		}

		await persistConfiguration(context, assigned.value)
		if (created) {
			consola.success(`Created ${context.configPath}.`)
		}
		consola.success(`Created empty group "${core}" for ${context.hostname}.`)
		return CommandResult.completed({ created, groups: [core] })
	}

	const selection = await selectGroups(config, context, options)
	if (selection === null) {
		return CommandResult.cancelled()
	}
	if (selection.length === 0) {
		throw new Error("No groups selected.")
	}

	const current = groupsForMachine(config, context.hostname)
	if (sameGroups(current, selection)) {
		return CommandResult.unchanged(
			`${context.hostname} already uses groups: ${selection.join(", ")}.`,
		)
	}

	const assigned = assignGroups(config, context.hostname, selection)
	if (!assigned.ok) {
		throw new Error(assigned.error.message)
	}

	await persistConfiguration(context, assigned.value)
	consola.success(`${context.hostname} now uses groups: ${selection.join(", ")}.`)
	return CommandResult.completed({ created, groups: selection })
}

/**
 * `--groups a,b`, else a prompt. Returns null when the prompt is cancelled.
 */
async function selectGroups(
	config: Configuration,
	context: CommandContext,
	options: InitOptions,
): Promise<GroupName[] | null> {
	if (options.groups !== undefined) {
		return parseGroupList(options.groups)
	}

	if (options.nonInteractive) {
		const current = groupsForMachine(config, context.hostname)
		if (current.length > 0) {
			return [...current]
		}
		throw new Error("Pass --groups <a,b> to choose groups in non-interactive mode.")
	}

	const current = new Set(groupsForMachine(config, context.hostname))
	const groupOptions = [...config.groups.values()].map(
		(group) => ({
			label: `${group.name} (${group.packages.size} packages)`,
			value: group.name,
		}),
	)

	const selected = await multiselect<GroupName>({
		initialValues: groupOptions
			.map((option) => option.value)
			.filter((name) => current.has(name)),
		message: `Select groups for ${context.hostname}`,
		options: groupOptions,
		required: true,
	})

	if (isCancel(selected)) {
		return null
	}
	return selected
}

export function parseGroupList(value: string): GroupName[] {
	const groups: GroupName[] = []
	for (const entry of value.split(",")) {
		if (!entry.trim()) {
			continue
		}
		const group = coerceGroupName(entry)
		if (!group) {
			throw new Error(`Invalid group name "${entry.trim()}".`)
		}
		if (!groups.includes(group)) {
			groups.push(group)
		}
	}
	return groups
}

function sameGroups(left: readonly GroupName[], right: readonly GroupName[]): boolean {
	return left.length === right.length && left.every((name, index) => right[index] === name)
}
