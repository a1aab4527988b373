import { confirm, isCancel } from "@clack/prompts"
import { formatRef, toAdopt, toRemove } from "@brewfile/core"
import { consola } from "consola"
import type { ConfirmationRequest, ConfirmationStrategy } from "@/src/core/sync/types"

export const autoApprove: ConfirmationStrategy = {
	confirm: async () => true,
}

export const alwaysDeny: ConfirmationStrategy = {
	confirm: async () => false,
}

export const promptConfirmation: ConfirmationStrategy = {
	async confirm(request) {
		for (const line of describePlan(request)) {
			consola.info(line)
		}
		const answer = await confirm({
			initialValue: request.mode === "adopt",
			message: describeRequest(request),
		})
		if (isCancel(answer)) {
			return false
		}
		return answer
	},
}

/**
 * The packages each action will touch, one line per non-empty action, in the
 * order the executor runs them.
 */
export function describePlan(request: ConfirmationRequest): string[] {
	const lines: string[] = []
	if (request.plan.toInstall.length > 0) {
		lines.push(`Install: ${request.plan.toInstall.map(formatRef).join(", ")}`)
	}

	if (request.mode === "adopt") {
		const adopt = toAdopt(request.plan)
		if (adopt.length > 0) {
			const target = request.adoptTarget ? ` into "${request.adoptTarget}"` : ""
			lines.push(`Adopt${target}: ${adopt.map(formatRef).join(", ")}`)
		}
	} else {
		const remove = [...toRemove(request.plan)].reverse()
		if (remove.length > 0) {
			lines.push(`Uninstall: ${remove.map(formatRef).join(", ")}`)
		}
	}

	return lines
}

export function describeRequest(request: ConfirmationRequest): string {
	const parts: string[] = []
	const installs = request.plan.toInstall.length
	if (installs > 0) {
		parts.push(`install ${installs} package(s)`)
	}

	if (request.mode === "adopt") {
		const adopt = toAdopt(request.plan).length
		if (adopt > 0) {
			const target = request.adoptTarget ? ` into "${request.adoptTarget}"` : ""
			parts.push(`adopt ${adopt} extra package(s)${target}`)
		}
	} else {
		const remove = toRemove(request.plan)
		if (remove.length > 0) {
			parts.push(`uninstall ${remove.length} extra package(s) (${remove.map(formatRef).join(", ")})`)
		}
	}

	const action = parts.length > 0 ? parts.join(" and ") : "apply no changes"
	return `${capitalize(action)} on ${request.hostname}?`
}

function capitalize(value: string): string {
	return value.charAt(0).toUpperCase() + value.slice(1)
}
