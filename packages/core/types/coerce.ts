import path from "node:path"
import type {
	AbsolutePath,
	GroupName,
	Hostname,
	MasId,
	NonEmptyString,
	PackageName,
} from "./branded"

export function coerceNonEmpty(value: string): NonEmptyString | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

// Formula and cask tokens and tap-qualified names (user/repo/name).
const PACKAGE_NAME_INVALID_CHARS = /[\s"\\]|::/u

export function coercePackageName(value: string): PackageName | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as PackageName
}

export function coerceHomebrewName(value: string): PackageName | null {
	const name = coercePackageName(value)
	if (!name) return null
	if (PACKAGE_NAME_INVALID_CHARS.test(name)) return null
	return name
}

const GROUP_NAME_INVALID_CHARS = /[\s/\\,]/u

// Not a usable object key in the JSON file.
const RESERVED_KEY = "__proto__"

export function coerceGroupName(value: string): GroupName | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (GROUP_NAME_INVALID_CHARS.test(trimmed)) return null
	if (trimmed === RESERVED_KEY) return null
	return trimmed as GroupName
}

export function coerceHostname(value: string): Hostname | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (/\s/u.test(trimmed)) return null
	if (trimmed === RESERVED_KEY) return null
	return trimmed as Hostname
}

const MAS_ID_PATTERN = /^[0-9]+$/

export function coerceMasId(value: string | number): MasId | null {
	const raw = typeof value === "number" ? String(value) : value.trim()
	if (!MAS_ID_PATTERN.test(raw)) return null
	const parsed = Number.parseInt(raw, 10)
	if (!Number.isSafeInteger(parsed) || parsed <= 0) return null
	return parsed as MasId
}

export function coerceAbsolutePath(
	value: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}
