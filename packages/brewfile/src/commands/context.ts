import type { AbsolutePath, Configuration, Hostname } from "@brewfile/core"
import { createHomebrewBackend } from "@/src/core/brew/homebrew"
import type { PackageBackend } from "@/src/core/brew/types"
import { loadConfiguration, saveConfiguration } from "@/src/core/config/store"
import type { GlobalOptions } from "@/src/commands/types"
import { detectHostname, resolveConfigPath } from "@/src/env"

/** What every command needs; tests build one around a fake backend. */
export interface CommandContext {
	configPath: AbsolutePath
	hostname: Hostname
	backend: PackageBackend
}

export function createContext(options: GlobalOptions): CommandContext {
	const hostname = detectHostname(options.host)
	if (!hostname) {
		throw new Error("Unable to determine this machine's hostname. Pass --host <name>.")
	}

	return {
		backend: createHomebrewBackend(),
		configPath: resolveConfigPath(process.env, options.config),
		hostname,
	}
}

export async function requireConfiguration(context: CommandContext): Promise<Configuration> {
	const loaded = await loadConfiguration(context.configPath)
	if (!loaded.ok) {
		throw new Error(loaded.error.message)
	}
	return loaded.value
}

export async function persistConfiguration(
	context: CommandContext,
	config: Configuration,
): Promise<void> {
	const saved = await saveConfiguration(config, context.configPath)
	if (!saved.ok) {
		throw new Error(saved.error.message)
	}
}
