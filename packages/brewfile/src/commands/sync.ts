import { formatRef, toAdopt, toRemove } from "@brewfile/core"
import { consola } from "consola"
import type { CommandContext } from "@/src/commands/context"
import { createContext, persistConfiguration, requireConfiguration } from "@/src/commands/context"
import type { GlobalOptions } from "@/src/commands/types"
import { CommandResult, EXIT_PARTIAL_FAILURE, printOutcome } from "@/src/commands/types"
import { autoApprove, promptConfirmation } from "@/src/core/sync/confirm"
import { runSync } from "@/src/core/sync/executor"
import type {
	ConfirmationStrategy,
	SyncEvent,
	SyncMode,
	SyncReport,
} from "@/src/core/sync/types"
import { formatError } from "@/src/utils/errors"

export interface SyncCommandOptions {
	dryRun: boolean
	yes: boolean
}

export async function syncCommand(
	mode: SyncMode,
	options: SyncCommandOptions & GlobalOptions,
): Promise<void> {
	consola.info(`brewfile sync-${mode}`)

	try {
		const context = createContext(options)
		const result = await runSyncCommand(context, mode, {
			confirmation: options.yes ? autoApprove : promptConfirmation,
			dryRun: options.dryRun,
		})
		printOutcome(result)
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Sync failed.")
	}
}

export async function runSyncCommand(
	context: CommandContext,
	mode: SyncMode,
	options: { confirmation: ConfirmationStrategy; dryRun: boolean },
): Promise<CommandResult<SyncReport>> {
	const config = await requireConfiguration(context)

	consola.start(options.dryRun ? "Planning sync..." : "Reading installed packages...")
	const result = await runSync({
		config,
		confirmation: options.confirmation,
		dryRun: options.dryRun,
		hostname: context.hostname,
		inventory: context.backend,
		manager: context.backend,
		mode,
		onEvent: logEvent,
	})
	if (!result.ok) {
		throw new Error(result.error.message)
	}

	const report = result.value
	for (const skipped of report.plan.skipped) {
		consola.warn(`Skipping ${formatRef(skipped)}: mas is not installed.`)
	}

	if (report.state === "aborted") {
		return CommandResult.cancelled()
	}

	if (report.dryRun) {
		printPlan(report)
		return CommandResult.completed(report)
	}

	if (report.outcomes.length === 0) {
		return CommandResult.unchanged("Everything is in sync.")
	}

	if (report.configChanged) {
		await persistConfiguration(context, report.config)
		consola.success(
			`Adopted ${report.adopted.length} package(s) into "${report.adoptTarget ?? ""}".`,
		)
	}

	printSummary(report)
	if (report.state === "partially_failed") {
		for (const failure of report.failures) {
			consola.error(`${failure.target}: ${failure.message}`)
		}
		consola.error(`${report.failures.length} action(s) failed.`)
		return CommandResult.failed(EXIT_PARTIAL_FAILURE)
	}

	return CommandResult.completed(report)
}

function logEvent(event: SyncEvent): void {
	if (event.type === "action") {
		switch (event.action) {
			case "install":
				consola.start(`Installing ${formatRef(event.ref)}...`)
				break
			case "uninstall":
				consola.start(`Uninstalling ${formatRef(event.ref)}...`)
				break
			case "adopt":
				break
		}
	}
}

function printPlan(report: SyncReport): void {
	const install = report.plan.toInstall.map(formatRef)
	consola.info(`Would install: ${install.length > 0 ? install.join(", ") : "nothing"}`)

	if (report.mode === "adopt") {
		const adopt = toAdopt(report.plan).map(formatRef)
		const target = adopt.length > 0 && report.adoptTarget ? ` into "${report.adoptTarget}"` : ""
		consola.info(`Would adopt${target}: ${adopt.length > 0 ? adopt.join(", ") : "nothing"}`)
	} else {
		const remove = [...toRemove(report.plan)].reverse().map(formatRef)
		consola.info(`Would uninstall: ${remove.length > 0 ? remove.join(", ") : "nothing"}`)
	}
}

function printSummary(report: SyncReport): void {
	const parts = [`installed ${report.installed.length}`]
	if (report.mode === "adopt") {
		parts.push(`adopted ${report.adopted.length}`)
	} else {
		parts.push(`uninstalled ${report.uninstalled.length}`)
	}
	parts.push(`failed ${report.failures.length}`)
	consola.info(`Sync summary: ${parts.join(", ")}.`)
}
