import type { PackageRef } from "../package/types"
import type { GroupName, Hostname } from "../types/branded"

export const DEFAULT_CONFIG_VERSION = "1.0"

// =============================================================================
// RAW FILE SHAPE (JSON, before coercion)
// =============================================================================

export interface RawGroup {
	taps?: string[]
	brews?: string[]
	casks?: string[]
	mas?: string[]
}

export interface RawConfiguration {
	version?: string
	groups?: Record<string, RawGroup>
	machines?: Record<string, string[]>
	[key: string]: unknown
}

// =============================================================================
// VALIDATED CONFIGURATION
// =============================================================================

export interface Group {
	readonly name: GroupName
	/** Keyed by refKey, so a ref appears at most once per group. */
	readonly packages: ReadonlyMap<string, PackageRef>
}

export interface Configuration {
	readonly version: string
	readonly groups: ReadonlyMap<GroupName, Group>
	/** Hostname to group names, in the order the user listed them. */
	readonly machines: ReadonlyMap<Hostname, readonly GroupName[]>
	/** Top-level keys this version does not understand, written back untouched. */
	readonly extra: Readonly<Record<string, unknown>>
}

// =============================================================================
// DERIVED STATE
// =============================================================================

export interface DesiredPackage {
	readonly ref: PackageRef
	/** First group, in machine order, that asked for the ref. */
	readonly group: GroupName
}

export interface DesiredState {
	readonly hostname: Hostname
	readonly groups: readonly GroupName[]
	readonly packages: readonly DesiredPackage[]
}
