import type { DesiredState } from "../config/types"
import type { PackageKind, PackageRef } from "../package/types"
import { refKey, sortRefs } from "../package/types"
import type { ActualState, InventoryCapabilities, ReconciliationPlan } from "./types"

/**
 * Compare desired and installed packages by (name, kind).
 *
 * Every bucket is ordered tap, formula, cask, mas and then by name, which is
 * also the order installs must run in.
 */
export function reconcile(desired: DesiredState, actual: ActualState): ReconciliationPlan {
	const installed = new Set(actual.packages.map(refKey))
	const wanted = new Set(desired.packages.map((entry) => refKey(entry.ref)))

	const toInstall: PackageRef[] = []
	const skipped: PackageRef[] = []
	for (const { ref } of desired.packages) {
		if (!isQueryable(ref.kind, actual.capabilities)) {
			skipped.push(ref)
			continue
		}
		if (!installed.has(refKey(ref))) {
			toInstall.push(ref)
		}
	}

	const extras = actual.packages.filter(
		(ref) => isQueryable(ref.kind, actual.capabilities) && !wanted.has(refKey(ref)),
	)

	return {
		extras: dedupe(extras),
		skipped: sortRefs(skipped),
		toInstall: sortRefs(toInstall),
	}
}

export function toAdopt(plan: ReconciliationPlan): readonly PackageRef[] {
	return plan.extras
}

export function toRemove(plan: ReconciliationPlan): readonly PackageRef[] {
	return plan.extras
}

export function isPlanEmpty(plan: ReconciliationPlan): boolean {
	return plan.toInstall.length === 0 && plan.extras.length === 0
}

export function isQueryable(kind: PackageKind, capabilities: InventoryCapabilities): boolean {
	return kind !== "mas" || capabilities.mas
}

function dedupe(refs: readonly PackageRef[]): PackageRef[] {
	const seen = new Map<string, PackageRef>()
	for (const ref of refs) {
		const key = refKey(ref)
		if (!seen.has(key)) {
			seen.set(key, ref)
		}
	}
	return sortRefs(seen.values())
}
