/**
 * In-process stand-ins for Homebrew.
 */

import type {
	ActualState,
	InstallFailedError,
	InventoryQueryFailedError,
	PackageRef,
	Result,
	UninstallFailedError,
} from "@brewfile/core"
import { formatRef, refKey, sortRefs } from "@brewfile/core"
import type { CommandRunner, PackageBackend, ProcessOutput } from "@/src/core/brew/types"

/**
 * Answers commands from a table keyed by the full command line
 * (`"brew tap"`). Unscripted commands exit 1.
 */
export class FakeRunner implements CommandRunner {
	readonly calls: string[] = []
	private readonly responses = new Map<string, ProcessOutput>()

	respond(commandLine: string, output: Partial<ProcessOutput>): this {
		this.responses.set(commandLine, { code: 0, stderr: "", stdout: "", ...output })
		return this
	}

	async run(command: string, args: readonly string[]): Promise<ProcessOutput> {
		const commandLine = [command, ...args].join(" ")
		this.calls.push(commandLine)
		return (
			this.responses.get(commandLine) ?? {
				code: 1,
				stderr: `unscripted: ${commandLine}`,
				stdout: "",
			}
		)
	}
}

export interface FakeBackendOptions {
	installed?: PackageRef[]
	masAvailable?: boolean
	knownCasks?: string[]
	knownFormulas?: string[]
	/**
	 * Refs whose install or uninstall fails, as printed by formatRef, or as
	 * `<kind> <literal>` to fail only one kind of a shared name.
	 */
	failing?: string[]
	inventoryError?: string
}

/**
 * Package backend over an in-memory installed set. Records every call in
 * `log` as `install <literal>` or `uninstall <literal>`.
 */
export class FakeBackend implements PackageBackend {
	readonly log: string[] = []
	private readonly installed = new Map<string, PackageRef>()
	private readonly options: FakeBackendOptions

	constructor(options: FakeBackendOptions = {}) {
		this.options = options
		for (const ref of options.installed ?? []) {
			this.installed.set(refKey(ref), ref)
		}
	}

	get packages(): PackageRef[] {
		return sortRefs(this.installed.values())
	}

	async currentInventory(): Promise<Result<ActualState, InventoryQueryFailedError>> {
		if (this.options.inventoryError) {
			return {
				error: {
					command: "brew tap",
					message: this.options.inventoryError,
					type: "inventory_query_failed",
				},
				ok: false,
			}
		}

		const mas = this.options.masAvailable ?? true
		return {
			ok: true,
			value: {
				capabilities: { mas },
				packages: this.packages.filter((ref) => mas || ref.kind !== "mas"),
			},
		}
	}

	async install(ref: PackageRef): Promise<Result<void, InstallFailedError>> {
		const literal = formatRef(ref)
		this.log.push(`install ${literal}`)
		if (this.fails(ref)) {
			return {
				error: { message: `install of ${literal} failed`, target: literal, type: "install_failed" },
				ok: false,
			}
		}
		this.installed.set(refKey(ref), ref)
		return { ok: true, value: undefined }
	}

	async uninstall(ref: PackageRef): Promise<Result<void, UninstallFailedError>> {
		const literal = formatRef(ref)
		this.log.push(`uninstall ${literal}`)
		if (this.fails(ref)) {
			return {
				error: {
					message: `uninstall of ${literal} failed`,
					target: literal,
					type: "uninstall_failed",
				},
				ok: false,
			}
		}
		this.installed.delete(refKey(ref))
		return { ok: true, value: undefined }
	}

	private fails(ref: PackageRef): boolean {
		const literal = formatRef(ref)
		const failing = this.options.failing ?? []
		return failing.includes(literal) || failing.includes(`${ref.kind} ${literal}`)
	}

	async isKnownCask(name: string): Promise<boolean> {
		return this.options.knownCasks?.includes(name) ?? false
	}

	async isKnownFormula(name: string): Promise<boolean> {
		return this.options.knownFormulas?.includes(name) ?? false
	}
}
