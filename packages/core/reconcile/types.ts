import type { DesiredPackage } from "../config/types"
import type { PackageKind, PackageRef } from "../package/types"

/** Which kinds the inventory could actually query. */
export interface InventoryCapabilities {
	readonly mas: boolean
}

export interface ActualState {
	readonly packages: readonly PackageRef[]
	readonly capabilities: InventoryCapabilities
}

export interface ReconciliationPlan {
	/** Desired but not installed, in install order. */
	readonly toInstall: readonly PackageRef[]
	/** Installed but not desired. Adopted or removed depending on the sync mode. */
	readonly extras: readonly PackageRef[]
	/** Desired refs of a kind the inventory could not query. */
	readonly skipped: readonly PackageRef[]
}

export type EntryState = "installed" | "missing" | "skipped"

export interface StatusEntry {
	readonly ref: PackageRef
	readonly group: DesiredPackage["group"]
	readonly state: EntryState
}

export interface StatusSection {
	readonly kind: PackageKind
	readonly configured: readonly StatusEntry[]
	readonly extras: readonly PackageRef[]
}

export interface StatusReport {
	readonly sections: readonly StatusSection[]
	readonly missing: number
	readonly extra: number
	readonly skipped: number
	readonly inSync: boolean
}
