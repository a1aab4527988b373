import type { DesiredState } from "../config/types"
import type { PackageRef } from "../package/types"
import { PACKAGE_KINDS } from "../package/types"

/**
 * Render a machine's desired state as a Brewfile for `brew bundle`.
 * Sections follow install order and are separated by a blank line.
 */
export function renderBrewfile(desired: DesiredState): string {
	const sections: string[] = []
	for (const kind of PACKAGE_KINDS) {
		const lines = desired.packages
			.filter((entry) => entry.ref.kind === kind)
			.map((entry) => renderLine(entry.ref))
		if (lines.length > 0) {
			sections.push(lines.join("\n"))
		}
	}

	return sections.length > 0 ? `${sections.join("\n\n")}\n` : ""
}

function renderLine(ref: PackageRef): string {
	switch (ref.kind) {
		case "tap":
			return `tap ${quote(ref.name)}`
		case "formula":
			return `brew ${quote(ref.name)}`
		case "cask":
			return `cask ${quote(ref.name)}`
		case "mas":
			return `mas ${quote(ref.name)}, id: ${ref.masId}`
	}
}

function quote(value: string): string {
	return JSON.stringify(value)
}
