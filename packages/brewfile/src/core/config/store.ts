import type {
	AbsolutePath,
	Configuration,
	ConfigNotFoundError,
	ConfigParseError,
	ConfigSchemaError,
	ConfigWriteError,
	Result,
} from "@brewfile/core"
import { parseConfiguration, serializeConfiguration } from "@brewfile/core"
import { readTextFileIfExists, writeTextFileAtomic } from "@/src/core/io/fs"

export type LoadConfigurationError = ConfigNotFoundError | ConfigParseError | ConfigSchemaError

export async function loadConfiguration(
	configPath: AbsolutePath,
): Promise<Result<Configuration, LoadConfigurationError>> {
	const read = await readTextFileIfExists(configPath)
	if (!read.ok) {
		return {
			error: {
				cause: read.error,
				message: `Unable to read ${configPath}: ${read.error.message}`,
				path: configPath,
				type: "config_parse",
			},
			ok: false,
		}
	}

	if (read.value === null) {
		return {
			error: {
				message: `Configuration not found at ${configPath}. Run \`brewfile init\` first.`,
				path: configPath,
				type: "config_not_found",
			},
			ok: false,
		}
	}

	return parseConfiguration(read.value, configPath)
}

/**
 * Persist the configuration atomically. On failure the previous file is left
 * as it was.
 */
export async function saveConfiguration(
	config: Configuration,
	configPath: AbsolutePath,
): Promise<Result<void, ConfigWriteError>> {
	const written = await writeTextFileAtomic(configPath, serializeConfiguration(config))
	if (!written.ok) {
		return {
			error: {
				cause: written.error,
				message: `Unable to write ${configPath}: ${written.error.message}`,
				path: configPath,
				rawError: written.error.rawError,
				type: "config_write",
			},
			ok: false,
		}
	}

	return { ok: true, value: undefined }
}
