import type { ZodError } from "zod"
import type { AbsolutePath } from "./branded"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ConfigNotFoundError = BaseError & {
	type: "config_not_found"
	path: AbsolutePath
}

export type ConfigParseError = BaseError & {
	type: "config_parse"
	path?: AbsolutePath
}

export type ConfigSchemaError =
	| (BaseError & {
			type: "config_schema"
			source: "zod"
			path?: AbsolutePath
			zodError: ZodError
	  })
	| (BaseError & {
			type: "config_schema"
			source: "manual"
			field: string
			path?: AbsolutePath
	  })

export type ConfigWriteError = BaseError & {
	type: "config_write"
	path: AbsolutePath
}

export type InvalidMasIdError = BaseError & {
	type: "invalid_mas_id"
	literal: string
}

export type UnknownPackageError = BaseError & {
	type: "unknown_package"
	name: string
}

export type InventoryQueryFailedError = BaseError & {
	type: "inventory_query_failed"
	command: string
}

export type InstallFailedError = BaseError & {
	type: "install_failed"
	target: string
}

export type UninstallFailedError = BaseError & {
	type: "uninstall_failed"
	target: string
}

export type ActionError = InstallFailedError | UninstallFailedError

export type ConfigError =
	| ConfigNotFoundError
	| ConfigParseError
	| ConfigSchemaError
	| ConfigWriteError

export type ClassifyError = InvalidMasIdError | UnknownPackageError

export type CoreError = ConfigError | ClassifyError | InventoryQueryFailedError | ActionError

export type Result<T, E extends BaseError = CoreError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
