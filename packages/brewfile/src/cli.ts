#!/usr/bin/env node

import type { PackageKind } from "@brewfile/core"
import { Command } from "commander"
import { consola } from "consola"
import { addCommand } from "@/src/commands/add"
import { dumpCommand } from "@/src/commands/dump"
import { editCommand } from "@/src/commands/edit"
import { initCommand } from "@/src/commands/init"
import { interactiveCommand } from "@/src/commands/interactive"
import { removeCommand } from "@/src/commands/remove"
import { statusCommand } from "@/src/commands/status"
import { syncCommand } from "@/src/commands/sync"
import type { GlobalOptions } from "@/src/commands/types"

function buildProgram(): Command {
	const program = new Command()

	program
		.name("brewfile")
		.description("Machine-aware Homebrew package sync")
		.option("--config <path>", "Use a different configuration file")
		.option("--host <name>", "Act as this machine instead of the detected hostname")
		.allowExcessArguments(false)
		.showHelpAfterError()
		.showSuggestionAfterError()

	const globals = (): GlobalOptions => program.opts<GlobalOptions>()

	program
		.command("init")
		.description("Create the configuration and choose this machine's groups")
		.option("--groups <groups>", "Comma-separated group names")
		.option("--non-interactive", "Run without prompts")
		.action(async (options: { groups?: string; nonInteractive?: boolean }) => {
			await initCommand({
				...globals(),
				groups: options.groups,
				nonInteractive: Boolean(options.nonInteractive),
			})
		})

	program
		.command("status")
		.description("Show configured, missing and extra packages")
		.action(async () => {
			await statusCommand(globals())
		})

	program
		.command("add")
		.description("Add a package to a group and install it")
		.argument("<package>", "Package name, user/repo tap, or AppName::AppID")
		.option("--cask", "Treat the package as a cask")
		.option("--formula", "Treat the package as a formula")
		.option("--tap", "Treat the package as a tap")
		.option("--group <name>", "Group to add the package to")
		.option("--no-install", "Only update the configuration")
		.action(
			async (
				literal: string,
				options: {
					cask?: boolean
					formula?: boolean
					tap?: boolean
					group?: string
					install: boolean
				},
			) => {
				await addCommand(literal, {
					...globals(),
					group: options.group,
					install: options.install,
					kind: kindOverride(options),
				})
			},
		)

	program
		.command("remove")
		.description("Uninstall a package and remove it from the configuration")
		.argument("<package>", "Package name or AppName::AppID")
		.option("--group <name>", "Only remove it from this group")
		.option("--keep-installed", "Leave the package installed")
		.action(async (literal: string, options: { group?: string; keepInstalled?: boolean }) => {
			await removeCommand(literal, {
				...globals(),
				group: options.group,
				keepInstalled: Boolean(options.keepInstalled),
			})
		})

	program
		.command("edit")
		.description("Open the configuration in $EDITOR")
		.action(async () => {
			await editCommand(globals())
		})

	program
		.command("sync-adopt")
		.description("Install missing packages and add extras to the configuration")
		.option("-y, --yes", "Skip the confirmation prompt")
		.option("--dry-run", "Show the plan without changing anything")
		.action(async (options: { yes?: boolean; dryRun?: boolean }) => {
			await syncCommand("adopt", {
				...globals(),
				dryRun: Boolean(options.dryRun),
				yes: Boolean(options.yes),
			})
		})

	program
		.command("sync-cleanup")
		.description("Install missing packages and uninstall extras")
		.option("-y, --yes", "Skip the confirmation prompt")
		.option("--dry-run", "Show the plan without changing anything")
		.action(async (options: { yes?: boolean; dryRun?: boolean }) => {
			await syncCommand("cleanup", {
				...globals(),
				dryRun: Boolean(options.dryRun),
				yes: Boolean(options.yes),
			})
		})

	program
		.command("dump")
		.description("Write this machine's Brewfile (default ~/Brewfile)")
		.argument("[path]", "Brewfile path")
		.action(async (target: string | undefined) => {
			await dumpCommand(target, globals())
		})

	program.action(async () => {
		await interactiveCommand(globals())
	})

	return program
}

function kindOverride(options: {
	cask?: boolean
	formula?: boolean
	tap?: boolean
}): PackageKind | undefined {
	const kinds: PackageKind[] = []
	if (options.cask) kinds.push("cask")
	if (options.formula) kinds.push("formula")
	if (options.tap) kinds.push("tap")

	if (kinds.length > 1) {
		throw new Error("Pass at most one of --cask, --formula and --tap.")
	}
	return kinds[0]
}

async function main(): Promise<void> {
	await buildProgram().parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
