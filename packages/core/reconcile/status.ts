import type { DesiredState } from "../config/types"
import { PACKAGE_KINDS, refKey } from "../package/types"
import type { ReconciliationPlan, StatusEntry, StatusReport, StatusSection } from "./types"

/**
 * Project desired state and a plan into a display model. Pure.
 */
export function status(desired: DesiredState, plan: ReconciliationPlan): StatusReport {
	const missing = new Set(plan.toInstall.map(refKey))
	const skipped = new Set(plan.skipped.map(refKey))

	const sections: StatusSection[] = []
	for (const kind of PACKAGE_KINDS) {
		const configured: StatusEntry[] = desired.packages
			.filter((entry) => entry.ref.kind === kind)
			.map((entry): StatusEntry => {
				const key = refKey(entry.ref)
				return {
					group: entry.group,
					ref: entry.ref,
					state: skipped.has(key) ? "skipped" : missing.has(key) ? "missing" : "installed",
				}
			})
		const extras = plan.extras.filter((ref) => ref.kind === kind)

		if (configured.length > 0 || extras.length > 0) {
			sections.push({ configured, extras, kind })
		}
	}

	return {
		extra: plan.extras.length,
		inSync: plan.toInstall.length === 0 && plan.extras.length === 0,
		missing: plan.toInstall.length,
		sections,
		skipped: plan.skipped.length,
	}
}
