import type { AbsolutePath } from "@brewfile/core"
import { renderBrewfile, resolveMachine } from "@brewfile/core"
import { consola } from "consola"
import type { CommandContext } from "@/src/commands/context"
import { createContext, requireConfiguration } from "@/src/commands/context"
import type { GlobalOptions } from "@/src/commands/types"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { writeTextFileAtomic } from "@/src/core/io/fs"
import { resolveBrewfilePath } from "@/src/env"
import { formatError } from "@/src/utils/errors"

export async function dumpCommand(
	target: string | undefined,
	options: GlobalOptions,
): Promise<void> {
	consola.info("brewfile dump")

	try {
		const context = createContext(options)
		const result = await runDump(context, resolveBrewfilePath(process.env, target))
		printOutcome(result)
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Dump failed.")
	}
}

/**
 * Write the machine's desired packages as a Brewfile for `brew bundle`.
 */
export async function runDump(
	context: CommandContext,
	brewfilePath: AbsolutePath,
): Promise<CommandResult<{ path: AbsolutePath; packages: number }>> {
	const config = await requireConfiguration(context)
	const desired = resolveMachine(config, context.hostname)
	if (desired.packages.length === 0) {
		consola.warn(`No packages configured for ${context.hostname}.`)
	}

	const written = await writeTextFileAtomic(brewfilePath, renderBrewfile(desired))
	if (!written.ok) {
		throw new Error(written.error.message)
	}

	consola.success(`Wrote ${desired.packages.length} package(s) to ${brewfilePath}.`)
	return CommandResult.completed({ packages: desired.packages.length, path: brewfilePath })
}
