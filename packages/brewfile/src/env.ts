import { homedir, hostname } from "node:os"
import path from "node:path"
import type { AbsolutePath, Hostname } from "@brewfile/core"
import { coerceAbsolutePath, coerceHostname } from "@brewfile/core"

export const CONFIG_FILE_NAME = "brewfile.json"
export const DEFAULT_EDITOR = "nano"

/**
 * `$BREWFILE_CONFIG`, else `$XDG_CONFIG_HOME/brewfile.json`, else
 * `~/.config/brewfile.json`.
 */
export function resolveConfigPath(
	env: NodeJS.ProcessEnv = process.env,
	override?: string,
): AbsolutePath {
	const explicit = override?.trim() || env.BREWFILE_CONFIG?.trim()
	if (explicit) {
		return toAbsolute(expandHome(explicit, env))
	}

	const xdg = env.XDG_CONFIG_HOME?.trim()
	const base = xdg ? expandHome(xdg, env) : path.join(homeDir(env), ".config")
	return toAbsolute(path.join(base, CONFIG_FILE_NAME))
}

export function resolveBrewfilePath(
	env: NodeJS.ProcessEnv = process.env,
	target?: string,
): AbsolutePath {
	const explicit = target?.trim()
	return toAbsolute(
		explicit ? expandHome(explicit, env) : path.join(homeDir(env), "Brewfile"),
	)
}

export function resolveEditor(env: NodeJS.ProcessEnv = process.env): string {
	const editor = env.EDITOR?.trim()
	return editor ? editor : DEFAULT_EDITOR
}

/**
 * The machine's hostname up to the first dot (`work.local` → `work`).
 */
export function detectHostname(override?: string): Hostname | null {
	const raw = override ?? hostname()
	const short = override ? raw : (raw.split(".")[0] ?? raw)
	return coerceHostname(short)
}

function homeDir(env: NodeJS.ProcessEnv): string {
	return env.HOME?.trim() || homedir()
}

function expandHome(value: string, env: NodeJS.ProcessEnv): string {
	if (value === "~") {
		return homeDir(env)
	}
	if (value.startsWith("~/")) {
		return path.join(homeDir(env), value.slice(2))
	}
	return value
}

function toAbsolute(value: string): AbsolutePath {
	const resolved = coerceAbsolutePath(value, process.cwd())
	if (!resolved) {
		throw new Error(`Invalid path: "${value}".`)
	}
	return resolved
}
