import type {
	ActionError,
	Configuration,
	GroupName,
	Hostname,
	InventoryQueryFailedError,
	PackageRef,
	Result,
} from "@brewfile/core"
import {
	addPackage,
	assignGroups,
	coerceGroupName,
	createGroup,
	groupsForMachine,
	isPlanEmpty,
	reconcile,
	resolveMachine,
	toAdopt,
	toRemove,
} from "@brewfile/core"
import type {
	ActionKind,
	ActionOutcome,
	FinalSyncState,
	SyncEvent,
	SyncOptions,
	SyncReport,
	SyncState,
} from "@/src/core/sync/types"

export const ADOPTED_GROUP = "adopted"

/**
 * Bring the machine in line with its configuration.
 *
 * planning → confirming → executing → completed | partially_failed | aborted.
 * Only an inventory failure stops the run; a failed install or uninstall is
 * recorded and the next action still runs.
 */
export async function runSync(
	options: SyncOptions,
): Promise<Result<SyncReport, InventoryQueryFailedError>> {
	const emit = options.onEvent ?? (() => {})
	const dryRun = Boolean(options.dryRun)
	const enter = (state: SyncState) => emit({ state, type: "state" })

	enter("planning")
	const desired = resolveMachine(options.config, options.hostname)
	const actual = await options.inventory.currentInventory()
	if (!actual.ok) {
		return actual
	}
	const plan = reconcile(desired, actual.value)

	const adoptTarget =
		options.mode === "adopt" && toAdopt(plan).length > 0
			? resolveAdoptTarget(options.config, options.hostname)
			: undefined

	const report: SyncReport = {
		adopted: [],
		adoptTarget: adoptTarget?.group,
		config: options.config,
		configChanged: false,
		dryRun,
		failures: [],
		installed: [],
		mode: options.mode,
		outcomes: [],
		plan,
		state: "completed",
		uninstalled: [],
	}

	if (isPlanEmpty(plan) || dryRun) {
		return finish(report, "completed", emit)
	}

	enter("confirming")
	const approved = await options.confirmation.confirm({
		adoptTarget: adoptTarget?.group,
		hostname: options.hostname,
		mode: options.mode,
		plan,
	})
	if (!approved) {
		return finish(report, "aborted", emit)
	}

	enter("executing")
	for (const ref of plan.toInstall) {
		emit({ action: "install", ref, type: "action" })
		const result = await options.manager.install(ref)
		record(report, "install", ref, result.ok ? null : result.error, emit)
		if (result.ok) {
			report.installed.push(ref)
		}
	}

	if (options.mode === "adopt" && adoptTarget) {
		let config = adoptTarget.config
		for (const ref of toAdopt(plan)) {
			emit({ action: "adopt", ref, type: "action" })
			config = addPackage(config, adoptTarget.group, ref)
			record(report, "adopt", ref, null, emit)
			report.adopted.push(ref)
		}
		report.config = config
		report.configChanged = report.adopted.length > 0
	}

	if (options.mode === "cleanup") {
		// Reverse plan order: casks and formulas leave before their taps.
		for (const ref of [...toRemove(plan)].reverse()) {
			emit({ action: "uninstall", ref, type: "action" })
			const result = await options.manager.uninstall(ref)
			record(report, "uninstall", ref, result.ok ? null : result.error, emit)
			if (result.ok) {
				report.uninstalled.push(ref)
			}
		}
	}

	return finish(report, report.failures.length > 0 ? "partially_failed" : "completed", emit)
}

interface AdoptTarget {
	group: GroupName
	/** Configuration with the group created and assigned, when it was not already. */
	config: Configuration
}

/**
 * Extras are adopted into the machine's first group. A machine without groups
 * gets an `adopted` group, created if needed and assigned to it.
 */
export function resolveAdoptTarget(config: Configuration, hostname: Hostname): AdoptTarget {
	const first = groupsForMachine(config, hostname)[0]
	if (first) {
		return { config, group: first }
	}

	const group = coerceGroupName(ADOPTED_GROUP)
	if (!group) {
		throw new Error(`Invalid group name "${ADOPTED_GROUP}".`)
	}

	const withGroup = createGroup(config, group)
	const assigned = assignGroups(withGroup, hostname, [group])
	if (!assigned.ok) {
		throw new Error(assigned.error.message)
	}
	return { config: assigned.value, group }
}

function record(
	report: SyncReport,
	action: ActionKind,
	ref: PackageRef,
	error: ActionError | null,
	emit: (event: SyncEvent) => void,
): void {
	const outcome: ActionOutcome = error ? { action, error, ok: false, ref } : { action, ok: true, ref }
	report.outcomes.push(outcome)
	if (error) {
		report.failures.push(error)
	}
	emit({ outcome, type: "outcome" })
}

function finish(
	report: SyncReport,
	state: FinalSyncState,
	emit: (event: SyncEvent) => void,
): Result<SyncReport, InventoryQueryFailedError> {
	emit({ state, type: "state" })
	return { ok: true, value: { ...report, state } }
}
