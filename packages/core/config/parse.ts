import { z } from "zod"
import { parseMasLiteral } from "../package/classify"
import type { PackageRef } from "../package/types"
import { refKey } from "../package/types"
import type { AbsolutePath, GroupName, Hostname } from "../types/branded"
import {
	coerceGroupName,
	coerceHomebrewName,
	coerceHostname,
	coerceNonEmpty,
} from "../types/coerce"
import type { ConfigParseError, ConfigSchemaError, Result } from "../types/error"
import type { Configuration, Group, RawConfiguration, RawGroup } from "./types"
import { DEFAULT_CONFIG_VERSION } from "./types"

export type ConfigurationParseResult = Result<
	Configuration,
	ConfigParseError | ConfigSchemaError
>

/** Keys this version reads; everything else at the top level is carried in `extra`. */
export const KNOWN_KEYS: ReadonlySet<string> = new Set(["groups", "machines", "version"])

const LEGACY_GROUPS_KEY = "packages"

const trimmedString = (label: string) =>
	z
		.string()
		.transform((value) => value.trim())
		.refine((value) => value.length > 0, {
			message: `${label} must not be empty.`,
		})

const groupSchema = z
	.object({
		brews: z.array(trimmedString("brew")).optional(),
		casks: z.array(trimmedString("cask")).optional(),
		mas: z.array(trimmedString("mas")).optional(),
		taps: z.array(trimmedString("tap")).optional(),
	})
	.strict()

const configurationSchema = z
	.object({
		groups: z.record(groupSchema).optional(),
		machines: z.record(z.array(trimmedString("group name"))).optional(),
		version: trimmedString("version").optional(),
	})
	.passthrough()

/**
 * Parse the JSON configuration, validate it and coerce it to branded types.
 *
 * @param sourcePath - Used in error messages only
 */
export function parseConfiguration(
	contents: string,
	sourcePath?: AbsolutePath,
): ConfigurationParseResult {
	let data: unknown

	try {
		data = JSON.parse(contents)
	} catch (error) {
		const message =
			error instanceof SyntaxError ? `Invalid JSON: ${error.message}` : "Invalid JSON."
		return {
			error: {
				message,
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				type: "config_parse",
			},
			ok: false,
		}
	}

	if (typeof data !== "object" || data === null || Array.isArray(data)) {
		return {
			error: {
				message: "Configuration must be a JSON object.",
				path: sourcePath,
				type: "config_parse",
			},
			ok: false,
		}
	}

	const source = adoptLegacyGroups(data)
	const parsed = configurationSchema.safeParse(source)
	if (!parsed.success) {
		return {
			error: {
				message: formatZodError(parsed.error),
				path: sourcePath,
				source: "zod",
				type: "config_schema",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	// zod drops a "__proto__" key from its output; unknown keys come from the source.
	return coerceConfiguration({ ...source, ...parsed.data }, sourcePath)
}

/**
 * Coerce an already-shaped raw configuration into the validated model.
 */
export function coerceConfiguration(
	raw: RawConfiguration,
	sourcePath?: AbsolutePath,
): Result<Configuration, ConfigSchemaError> {
	const version = coerceNonEmpty(raw.version ?? DEFAULT_CONFIG_VERSION)
	if (!version) {
		return schemaFailure("version", "version must not be empty.", sourcePath)
	}

	const groups = new Map<GroupName, Group>()
	for (const [rawName, rawGroup] of Object.entries(raw.groups ?? {})) {
		const name = coerceGroupName(rawName)
		if (!name) {
			return schemaFailure("groups", `Invalid group name: "${rawName}".`, sourcePath)
		}

		const group = coerceGroup(name, rawGroup, sourcePath)
		if (!group.ok) {
			return group
		}

		groups.set(name, group.value)
	}

	const machines = new Map<Hostname, GroupName[]>()
	for (const [rawHost, rawGroups] of Object.entries(raw.machines ?? {})) {
		const host = coerceHostname(rawHost)
		if (!host) {
			return schemaFailure("machines", `Invalid hostname: "${rawHost}".`, sourcePath)
		}

		const assigned: GroupName[] = []
		for (const rawGroupName of rawGroups) {
			const groupName = coerceGroupName(rawGroupName)
			if (!groupName || !groups.has(groupName)) {
				return schemaFailure(
					`machines.${rawHost}`,
					`Machine "${rawHost}" references undefined group "${rawGroupName}".`,
					sourcePath,
				)
			}
			if (!assigned.includes(groupName)) {
				assigned.push(groupName)
			}
		}

		machines.set(host, assigned)
	}

	const extra: Record<string, unknown> = Object.fromEntries(
		Object.entries(raw).filter(([key]) => !KNOWN_KEYS.has(key)),
	)

	return { ok: true, value: { extra, groups, machines, version } }
}

function coerceGroup(
	name: GroupName,
	raw: RawGroup,
	sourcePath?: AbsolutePath,
): Result<Group, ConfigSchemaError> {
	const packages = new Map<string, PackageRef>()
	const add = (ref: PackageRef) => {
		const key = refKey(ref)
		if (!packages.has(key)) {
			packages.set(key, ref)
		}
	}

	const homebrewLists = [
		["taps", "tap", raw.taps],
		["brews", "formula", raw.brews],
		["casks", "cask", raw.casks],
	] as const

	for (const [field, kind, entries] of homebrewLists) {
		for (const entry of entries ?? []) {
			const packageName = coerceHomebrewName(entry)
			if (!packageName) {
				return schemaFailure(
					`groups.${name}.${field}`,
					`Invalid package name "${entry}" in group "${name}".`,
					sourcePath,
				)
			}
			add({ kind, name: packageName })
		}
	}

	for (const entry of raw.mas ?? []) {
		const parsed = parseMasLiteral(entry)
		if (!parsed.ok) {
			return schemaFailure(`groups.${name}.mas`, parsed.error.message, sourcePath)
		}
		add(parsed.value)
	}

	return { ok: true, value: { name, packages } }
}

// The first release stored groups under "packages".
function adoptLegacyGroups(data: object): Record<string, unknown> {
	const entries = Object.entries(data)
	if (entries.some(([key]) => key === "groups")) {
		return Object.fromEntries(entries)
	}

	return Object.fromEntries(
		entries.map(([key, value]) => [key === LEGACY_GROUPS_KEY ? "groups" : key, value]),
	)
}

function formatZodError(error: z.ZodError): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join(".") : "configuration"
		return `${path}: ${issue.message}`
	})
	return `Invalid configuration: ${issues.join("; ")}`
}

function schemaFailure(
	field: string,
	message: string,
	path?: AbsolutePath,
): Result<never, ConfigSchemaError> {
	return {
		error: { field, message, path, source: "manual", type: "config_schema" },
		ok: false,
	}
}
