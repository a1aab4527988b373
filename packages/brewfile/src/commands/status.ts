import type {
	Configuration,
	DesiredState,
	ReconciliationPlan,
	StatusEntry,
	StatusReport,
} from "@brewfile/core"
import { formatRef, KIND_LABELS, reconcile, resolveMachine, status } from "@brewfile/core"
import { consola } from "consola"
import type { CommandContext } from "@/src/commands/context"
import { createContext, requireConfiguration } from "@/src/commands/context"
import type { GlobalOptions } from "@/src/commands/types"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { formatError } from "@/src/utils/errors"

export interface MachineStatus {
	config: Configuration
	desired: DesiredState
	plan: ReconciliationPlan
	report: StatusReport
}

export async function statusCommand(options: GlobalOptions): Promise<void> {
	consola.info("brewfile status")

	try {
		const context = createContext(options)
		const result = await runStatus(context)
		printOutcome(result)
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Status failed.")
	}
}

export async function runStatus(
	context: CommandContext,
): Promise<CommandResult<MachineStatus>> {
	const machine = await loadMachineStatus(context)
	printStatus(machine)
	return CommandResult.completed(machine)
}

/**
 * Load the configuration, query the inventory and reconcile the two.
 */
export async function loadMachineStatus(context: CommandContext): Promise<MachineStatus> {
	const config = await requireConfiguration(context)
	const desired = resolveMachine(config, context.hostname)

	consola.start("Reading installed packages...")
	const actual = await context.backend.currentInventory()
	if (!actual.ok) {
		throw new Error(actual.error.message)
	}

	const plan = reconcile(desired, actual.value)
	return { config, desired, plan, report: status(desired, plan) }
}

export function printStatus(machine: MachineStatus): void {
	for (const line of formatStatus(machine)) {
		consola.log(line)
	}
}

export function formatStatus(machine: MachineStatus): string[] {
	const { desired, report } = machine
	const lines: string[] = []

	lines.push(
		desired.groups.length > 0
			? `Machine ${desired.hostname} (groups: ${desired.groups.join(", ")})`
			: `Machine ${desired.hostname} has no groups. Run \`brewfile init\` to assign some.`,
	)

	for (const section of report.sections) {
		lines.push("")
		lines.push(`${KIND_LABELS[section.kind]}:`)
		for (const entry of section.configured) {
			lines.push(`  ${formatEntry(entry)}`)
		}
		for (const ref of section.extras) {
			lines.push(`  + ${formatRef(ref)} (extra)`)
		}
	}

	lines.push("")
	if (report.inSync) {
		lines.push("All packages synchronized.")
	} else {
		lines.push(`${report.missing} missing, ${report.extra} extra.`)
	}
	if (report.skipped > 0) {
		lines.push(`${report.skipped} App Store app(s) skipped: mas is not installed.`)
	}

	return lines
}

function formatEntry(entry: StatusEntry): string {
	const label = `${formatRef(entry.ref)} [${entry.group}]`
	switch (entry.state) {
		case "installed":
			return `✓ ${label}`
		case "missing":
			return `✗ ${label} (missing)`
		case "skipped":
			return `- ${label} (skipped)`
	}
}
