import type { PackageName } from "../types/branded"
import { coerceHomebrewName, coerceMasId, coercePackageName } from "../types/coerce"
import type {
	ClassifyError,
	InvalidMasIdError,
	Result,
	UnknownPackageError,
} from "../types/error"
import type { MasRef, PackageKind, PackageRef } from "./types"

export const MAS_SEPARATOR = "::"

const TAP_PATTERN = /^[^/\s]+\/[^/\s]+$/u

/**
 * Answers whether a name exists in the package manager's catalog.
 * Backed by Homebrew in the CLI and by fakes in tests.
 */
export interface PackageMetadata {
	isKnownCask(name: string): Promise<boolean>
	isKnownFormula(name: string): Promise<boolean>
}

export interface ClassifyOptions {
	override?: PackageKind
	metadata?: PackageMetadata
}

/**
 * Parse an `AppName::AppID` literal.
 */
export function parseMasLiteral(literal: string): Result<MasRef, InvalidMasIdError> {
	const index = literal.lastIndexOf(MAS_SEPARATOR)
	if (index < 0) {
		return invalidMasId(literal, `Expected AppName::AppID, got "${literal}".`)
	}

	const name = coercePackageName(literal.slice(0, index))
	if (!name) {
		return invalidMasId(literal, `Missing app name in "${literal}".`)
	}

	const rawId = literal.slice(index + MAS_SEPARATOR.length)
	const masId = coerceMasId(rawId)
	if (!masId) {
		return invalidMasId(literal, `Invalid App Store id "${rawId.trim()}" in "${literal}".`)
	}

	return { ok: true, value: { kind: "mas", masId, name } }
}

/**
 * Turn a command-line literal into a PackageRef.
 *
 * `Name::Id` is always an App Store app. Otherwise the override decides, and
 * without one the metadata source must recognise the name as exactly one of
 * formula or cask.
 */
export async function classify(
	literal: string,
	options: ClassifyOptions = {},
): Promise<Result<PackageRef, ClassifyError>> {
	const trimmed = literal.trim()
	if (!trimmed) {
		return unknownPackage(literal, "Package name is required.")
	}

	if (trimmed.includes(MAS_SEPARATOR)) {
		if (options.override && options.override !== "mas") {
			return invalidMasId(
				trimmed,
				`"${trimmed}" is an App Store literal and cannot be added as a ${options.override}.`,
			)
		}
		return parseMasLiteral(trimmed)
	}

	if (options.override === "mas") {
		return invalidMasId(trimmed, "App Store apps must be written as AppName::AppID.")
	}

	const name = coerceHomebrewName(trimmed)
	if (!name) {
		return unknownPackage(trimmed, `Invalid package name: ${trimmed}`)
	}

	if (options.override === "tap") {
		if (!TAP_PATTERN.test(name)) {
			return unknownPackage(name, `Tap names must look like user/repo, got "${name}".`)
		}
		return { ok: true, value: { kind: "tap", name } }
	}

	if (options.override === "formula" || options.override === "cask") {
		return { ok: true, value: { kind: options.override, name } }
	}

	if (!options.metadata) {
		return unknownPackage(
			name,
			`Cannot determine the type of "${name}". Pass --formula, --cask or --tap.`,
		)
	}

	return detectKind(name, options.metadata)
}

async function detectKind(
	name: PackageName,
	metadata: PackageMetadata,
): Promise<Result<PackageRef, ClassifyError>> {
	const isCask = await metadata.isKnownCask(name)
	const isFormula = await metadata.isKnownFormula(name)

	if (isCask && isFormula) {
		return unknownPackage(
			name,
			`"${name}" is both a formula and a cask. Pass --formula or --cask.`,
		)
	}

	if (isCask) {
		return { ok: true, value: { kind: "cask", name } }
	}

	if (isFormula) {
		return { ok: true, value: { kind: "formula", name } }
	}

	return unknownPackage(name, `Unknown package: ${name}`)
}

function invalidMasId(literal: string, message: string): Result<never, InvalidMasIdError> {
	return {
		error: { literal, message, type: "invalid_mas_id" },
		ok: false,
	}
}

function unknownPackage(name: string, message: string): Result<never, UnknownPackageError> {
	return {
		error: { message, name, type: "unknown_package" },
		ok: false,
	}
}
