import { spawn } from "node:child_process"
import { consola } from "consola"
import type { CommandContext } from "@/src/commands/context"
import { createContext, requireConfiguration } from "@/src/commands/context"
import type { GlobalOptions } from "@/src/commands/types"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { safeStat } from "@/src/core/io/fs"
import { resolveEditor } from "@/src/env"
import { formatError } from "@/src/utils/errors"

/** Opens a file in an editor and resolves with its exit code. */
export type EditorLauncher = (editor: string, filePath: string) => Promise<number>

export async function editCommand(options: GlobalOptions): Promise<void> {
	consola.info("brewfile edit")

	try {
		const context = createContext(options)
		const result = await runEdit(context, {
			editor: resolveEditor(),
			launch: launchEditor,
		})
		printOutcome(result)
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Edit failed.")
	}
}

/**
 * Open the configuration in `$EDITOR`, then load it again so mistakes are
 * reported straight away.
 */
export async function runEdit(
	context: CommandContext,
	options: { editor: string; launch: EditorLauncher },
): Promise<CommandResult> {
	const stats = await safeStat(context.configPath)
	if (!stats.ok) {
		throw new Error(stats.error.message)
	}
	if (!stats.value) {
		throw new Error(`Configuration not found at ${context.configPath}. Run \`brewfile init\` first.`)
	}

	consola.start(`Opening ${context.configPath} with ${options.editor}...`)
	const code = await options.launch(options.editor, context.configPath)
	if (code !== 0) {
		throw new Error(`${options.editor} exited with code ${code}.`)
	}

	await requireConfiguration(context)
	consola.success("Configuration is valid.")
	return CommandResult.completed(undefined)
}

export function launchEditor(editor: string, filePath: string): Promise<number> {
	const [command, ...args] = editor.split(/\s+/u).filter(Boolean)
	if (!command) {
		return Promise.reject(new Error("No editor configured."))
	}

	return new Promise((resolve, reject) => {
		const child = spawn(command, [...args, filePath], { stdio: "inherit" })
		child.on("error", reject)
		child.on("close", (code) => resolve(code ?? 1))
	})
}
