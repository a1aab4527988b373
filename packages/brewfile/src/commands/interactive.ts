import { isCancel, select } from "@clack/prompts"
import { consola } from "consola"
import type { CommandContext } from "@/src/commands/context"
import { createContext } from "@/src/commands/context"
import type { EditorLauncher } from "@/src/commands/edit"
import { launchEditor, runEdit } from "@/src/commands/edit"
import { loadMachineStatus, printStatus } from "@/src/commands/status"
import { runSyncCommand } from "@/src/commands/sync"
import type { GlobalOptions } from "@/src/commands/types"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { promptConfirmation } from "@/src/core/sync/confirm"
import type { ConfirmationStrategy } from "@/src/core/sync/types"
import { resolveEditor } from "@/src/env"
import { formatError } from "@/src/utils/errors"

export type MenuAction = "adopt" | "cleanup" | "edit" | "exit"

export interface InteractiveDeps {
	confirmation: ConfirmationStrategy
	editor: string
	launch: EditorLauncher
}

export async function interactiveCommand(options: GlobalOptions): Promise<void> {
	consola.info("brewfile")

	try {
		const context = createContext(options)
		const result = await runInteractive(context, {
			confirmation: promptConfirmation,
			editor: resolveEditor(),
			launch: launchEditor,
		})
		printOutcome(result)
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Interactive mode failed.")
	}
}

/**
 * Show status, then offer the sync modes. Nothing is offered when the
 * machine is already in sync.
 */
export async function runInteractive(
	context: CommandContext,
	deps: InteractiveDeps,
): Promise<CommandResult<unknown>> {
	const machine = await loadMachineStatus(context)
	printStatus(machine)

	if (machine.report.inSync) {
		return CommandResult.unchanged("Nothing to do.")
	}

	const action = await select<MenuAction>({
		message: "What do you want to do?",
		options: [
			{ hint: "install missing, keep extras", label: "Sync and adopt", value: "adopt" },
			{
				hint: "install missing, uninstall extras",
				label: "Sync and clean up",
				value: "cleanup",
			},
			{ label: "Edit configuration", value: "edit" },
			{ label: "Exit", value: "exit" },
		],
	})

	if (isCancel(action) || action === "exit") {
		return CommandResult.cancelled()
	}

	if (action === "edit") {
		return runEdit(context, { editor: deps.editor, launch: deps.launch })
	}

	return runSyncCommand(context, action, {
		confirmation: deps.confirmation,
		dryRun: false,
	})
}
