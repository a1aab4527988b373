import type {
	ActualState,
	InstallFailedError,
	InventoryQueryFailedError,
	PackageMetadata,
	PackageRef,
	Result,
	UninstallFailedError,
} from "@brewfile/core"

export interface ProcessOutput {
	/** Exit status; 127 when the executable could not be found. */
	code: number
	stdout: string
	stderr: string
}

/**
 * Runs an executable to completion. Never rejects for a non-zero exit.
 */
export interface CommandRunner {
	run(command: string, args: readonly string[]): Promise<ProcessOutput>
}

export interface PackageInventory {
	currentInventory(): Promise<Result<ActualState, InventoryQueryFailedError>>
}

export interface PackageManager {
	install(ref: PackageRef): Promise<Result<void, InstallFailedError>>
	uninstall(ref: PackageRef): Promise<Result<void, UninstallFailedError>>
}

export type PackageBackend = PackageInventory & PackageManager & PackageMetadata

export type { PackageMetadata }
