import { describe, expect, it } from "vitest"
import { brew, cask, group, host, tap } from "../tests/refs"
import { resolveMachine } from "./resolve"
import { addPackage, assignGroups, createEmptyConfiguration } from "./transform"
import type { Configuration } from "./types"

function buildConfig(): Configuration {
	let config = addPackage(createEmptyConfiguration(), group("development"), brew("neovim"))
	config = addPackage(config, group("development"), brew("git"))
	config = addPackage(config, group("base"), brew("git"))
	config = addPackage(config, group("base"), tap("homebrew/cask-fonts"))
	config = addPackage(config, group("apps"), cask("firefox"))

	const assigned = assignGroups(config, host("work"), [group("development"), group("base")])
	if (!assigned.ok) {
		throw new Error(assigned.error.message)
	}
	return assigned.value
}

describe("resolveMachine", () => {
	it("unions the machine's groups without duplicates, sorted", () => {
		const desired = resolveMachine(buildConfig(), host("work"))

		expect(desired.groups).toEqual(["development", "base"])
		expect(desired.packages).toEqual([
			{ group: "base", ref: tap("homebrew/cask-fonts") },
			{ group: "development", ref: brew("git") },
			{ group: "development", ref: brew("neovim") },
		])
	})

	it("ignores groups not assigned to the machine", () => {
		const desired = resolveMachine(buildConfig(), host("work"))

		expect(desired.packages.some((entry) => entry.ref.kind === "cask")).toBe(false)
	})

	it("returns an empty desired state for an unknown host", () => {
		const desired = resolveMachine(buildConfig(), host("new-laptop"))

		expect(desired).toEqual({ groups: [], hostname: "new-laptop", packages: [] })
	})
})
