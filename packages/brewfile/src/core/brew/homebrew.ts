import type {
	ActualState,
	InstallFailedError,
	InventoryQueryFailedError,
	MasRef,
	PackageRef,
	Result,
	UninstallFailedError,
} from "@brewfile/core"
import {
	coerceHomebrewName,
	coerceMasId,
	coercePackageName,
	formatRef,
	sortRefs,
} from "@brewfile/core"
import { COMMAND_NOT_FOUND, execFileRunner } from "@/src/core/brew/runner"
import type { CommandRunner, PackageBackend, ProcessOutput } from "@/src/core/brew/types"

const BREW = "brew"
const MAS = "mas"

interface Invocation {
	command: string
	args: string[]
}

const TAP_LIST: Invocation = { args: ["tap"], command: BREW }
// Every formula the user asked for, including ones another formula depends on.
const FORMULA_LIST: Invocation = {
	args: ["list", "--formula", "--installed-on-request", "-1"],
	command: BREW,
}
const CASK_LIST: Invocation = { args: ["list", "--cask", "-1"], command: BREW }
const MAS_LIST: Invocation = { args: ["list"], command: MAS }

/** `  497799835  Xcode  (15.4)`; the version column is optional. */
const MAS_LINE = /^\s*(\d+)\s+(.*?)\s*(?:\(([^()]*)\))?\s*$/u

/**
 * Homebrew (and `mas`, when present) behind the inventory, package manager
 * and metadata interfaces. Every call runs the tools again; nothing is cached.
 */
export function createHomebrewBackend(runner: CommandRunner = execFileRunner): PackageBackend {
	async function query(
		invocation: Invocation,
	): Promise<Result<ProcessOutput, InventoryQueryFailedError>> {
		const output = await runner.run(invocation.command, invocation.args)
		if (output.code !== 0) {
			const command = describe(invocation)
			return {
				error: {
					command,
					message: `\`${command}\` failed (exit ${output.code})${detail(output)}`,
					type: "inventory_query_failed",
				},
				ok: false,
			}
		}
		return { ok: true, value: output }
	}

	return {
		async currentInventory(): Promise<Result<ActualState, InventoryQueryFailedError>> {
			const packages: PackageRef[] = []

			const taps = await query(TAP_LIST)
			if (!taps.ok) {
				return taps
			}
			packages.push(...parseNameList(taps.value.stdout, "tap"))

			const formulas = await query(FORMULA_LIST)
			if (!formulas.ok) {
				return formulas
			}
			packages.push(...parseNameList(formulas.value.stdout, "formula"))

			const casks = await query(CASK_LIST)
			if (!casks.ok) {
				return casks
			}
			packages.push(...parseNameList(casks.value.stdout, "cask"))

			const apps = await runner.run(MAS_LIST.command, MAS_LIST.args)
			if (apps.code === COMMAND_NOT_FOUND) {
				return {
					ok: true,
					value: { capabilities: { mas: false }, packages: sortRefs(packages) },
				}
			}
			if (apps.code !== 0) {
				const command = describe(MAS_LIST)
				return {
					error: {
						command,
						message: `\`${command}\` failed (exit ${apps.code})${detail(apps)}`,
						type: "inventory_query_failed",
					},
					ok: false,
				}
			}
			packages.push(...parseMasList(apps.stdout))

			return {
				ok: true,
				value: { capabilities: { mas: true }, packages: sortRefs(packages) },
			}
		},

		async install(ref: PackageRef): Promise<Result<void, InstallFailedError>> {
			const invocation = installInvocation(ref)
			const output = await runner.run(invocation.command, invocation.args)
			if (output.code !== 0) {
				return {
					error: {
						message: `\`${describe(invocation)}\` failed${detail(output)}`,
						target: formatRef(ref),
						type: "install_failed",
					},
					ok: false,
				}
			}
			return { ok: true, value: undefined }
		},

		async isKnownCask(name: string): Promise<boolean> {
			const output = await runner.run(BREW, ["info", "--cask", "--json=v2", name])
			return output.code === 0
		},

		async isKnownFormula(name: string): Promise<boolean> {
			const output = await runner.run(BREW, ["info", "--formula", "--json=v2", name])
			return output.code === 0
		},

		async uninstall(ref: PackageRef): Promise<Result<void, UninstallFailedError>> {
			const invocation = uninstallInvocation(ref)
			const output = await runner.run(invocation.command, invocation.args)
			if (output.code !== 0) {
				return {
					error: {
						message: `\`${describe(invocation)}\` failed${detail(output)}`,
						target: formatRef(ref),
						type: "uninstall_failed",
					},
					ok: false,
				}
			}
			return { ok: true, value: undefined }
		},
	}
}

export function installInvocation(ref: PackageRef): Invocation {
	switch (ref.kind) {
		case "tap":
			return { args: ["tap", ref.name], command: BREW }
		case "formula":
			return { args: ["install", ref.name], command: BREW }
		case "cask":
			return { args: ["install", "--cask", ref.name], command: BREW }
		case "mas":
			return { args: ["install", String(ref.masId)], command: MAS }
	}
}

export function uninstallInvocation(ref: PackageRef): Invocation {
	switch (ref.kind) {
		case "tap":
			return { args: ["untap", ref.name], command: BREW }
		case "formula":
			return { args: ["uninstall", ref.name], command: BREW }
		case "cask":
			return { args: ["uninstall", "--cask", ref.name], command: BREW }
		case "mas":
			return { args: ["uninstall", String(ref.masId)], command: MAS }
	}
}

/**
 * One name per line, as printed by `brew tap` and `brew list -1`. Lines that are not valid names are dropped.
 */
export function parseNameList(stdout: string, kind: "tap" | "formula" | "cask"): PackageRef[] {
	const refs: PackageRef[] = []
	for (const line of stdout.split("\n")) {
		const name = coerceHomebrewName(line)
		if (name) {
			refs.push({ kind, name })
		}
	}
	return refs
}

/**
 * Parse `mas list` output into App Store refs.
 */
export function parseMasList(stdout: string): MasRef[] {
	const refs: MasRef[] = []
	for (const line of stdout.split("\n")) {
		const match = MAS_LINE.exec(line)
		if (!match) {
			continue
		}
		const masId = coerceMasId(match[1] ?? "")
		const name = coercePackageName(match[2] ?? "")
		if (masId && name) {
			refs.push({ kind: "mas", masId, name })
		}
	}
	return refs
}

function describe(invocation: Invocation): string {
	return [invocation.command, ...invocation.args].join(" ")
}

function detail(output: ProcessOutput): string {
	const lines = output.stderr
		.split("\n")
		.map((line) => line.trim())
		.filter(Boolean)
	const last = lines.at(-1)
	return last ? `: ${last}` : "."
}
