import type {
	ActionError,
	Configuration,
	GroupName,
	Hostname,
	PackageRef,
	ReconciliationPlan,
} from "@brewfile/core"
import type { PackageInventory, PackageManager } from "@/src/core/brew/types"

/** `adopt` keeps extras by writing them to the configuration; `cleanup` uninstalls them. */
export type SyncMode = "adopt" | "cleanup"

export type SyncState =
	| "planning"
	| "confirming"
	| "executing"
	| "completed"
	| "partially_failed"
	| "aborted"

export type FinalSyncState = Extract<SyncState, "completed" | "partially_failed" | "aborted">

export interface ConfirmationRequest {
	hostname: Hostname
	mode: SyncMode
	plan: ReconciliationPlan
	/** Group that extras are adopted into, in adopt mode. */
	adoptTarget?: GroupName
}

export interface ConfirmationStrategy {
	confirm(request: ConfirmationRequest): Promise<boolean>
}

export type ActionKind = "install" | "uninstall" | "adopt"

export type ActionOutcome =
	| { action: ActionKind; ref: PackageRef; ok: true }
	| { action: ActionKind; ref: PackageRef; ok: false; error: ActionError }

export type SyncEvent =
	| { type: "state"; state: SyncState }
	| { type: "action"; action: ActionKind; ref: PackageRef }
	| { type: "outcome"; outcome: ActionOutcome }

export interface SyncOptions {
	config: Configuration
	hostname: Hostname
	mode: SyncMode
	inventory: PackageInventory
	manager: PackageManager
	confirmation: ConfirmationStrategy
	dryRun?: boolean
	onEvent?: (event: SyncEvent) => void
}

export interface SyncReport {
	state: FinalSyncState
	mode: SyncMode
	dryRun: boolean
	plan: ReconciliationPlan
	outcomes: ActionOutcome[]
	installed: PackageRef[]
	uninstalled: PackageRef[]
	adopted: PackageRef[]
	failures: ActionError[]
	adoptTarget?: GroupName
	/** The configuration after adoption; the input unchanged otherwise. */
	config: Configuration
	configChanged: boolean
}
