import { confirm } from "@clack/prompts"
import { consola } from "consola"
import { afterEach, describe, expect, it, vi } from "vitest"
import { describePlan, describeRequest, promptConfirmation } from "@/src/core/sync/confirm"
import type { ConfirmationRequest } from "@/src/core/sync/types"
import { brew, cask, group, host } from "@/tests/helpers"

vi.mock("@clack/prompts", () => ({
	confirm: vi.fn(),
	isCancel: (value: unknown) => typeof value === "symbol",
}))

const confirmMock = vi.mocked(confirm)

function request(overrides: Partial<ConfirmationRequest> = {}): ConfirmationRequest {
	return {
		hostname: host("work"),
		mode: "cleanup",
		plan: { extras: [brew("htop"), cask("zoom")], skipped: [], toInstall: [brew("neovim")] },
		...overrides,
	}
}

describe("describeRequest", () => {
	it("lists uninstalls by name in cleanup mode", () => {
		expect(describeRequest(request())).toBe(
			"Install 1 package(s) and uninstall 2 extra package(s) (htop, zoom) on work?",
		)
	})

	it("names the adopt target in adopt mode", () => {
		expect(describeRequest(request({ adoptTarget: group("core"), mode: "adopt" }))).toBe(
			'Install 1 package(s) and adopt 2 extra package(s) into "core" on work?',
		)
	})

	it("leaves out empty parts", () => {
		const plan = { extras: [], skipped: [], toInstall: [brew("neovim")] }

		expect(describeRequest(request({ plan }))).toBe("Install 1 package(s) on work?")
	})
})

describe("describePlan", () => {
	it("names the packages to install and adopt", () => {
		const plan = { extras: [brew("htop")], skipped: [], toInstall: [brew("neovim")] }

		expect(describePlan(request({ adoptTarget: group("core"), mode: "adopt", plan }))).toEqual([
			"Install: neovim",
			'Adopt into "core": htop',
		])
	})

	it("lists uninstalls in the order they run", () => {
		expect(describePlan(request())).toEqual(["Install: neovim", "Uninstall: zoom, htop"])
	})

	it("is empty for an empty plan", () => {
		const plan = { extras: [], skipped: [], toInstall: [] }

		expect(describePlan(request({ plan }))).toEqual([])
	})
})

describe("promptConfirmation", () => {
	afterEach(() => {
		confirmMock.mockReset()
		vi.restoreAllMocks()
	})

	it("shows the plan before asking", async () => {
		const info = vi.spyOn(consola, "info").mockImplementation(() => undefined)
		confirmMock.mockResolvedValue(true)
		const plan = { extras: [brew("htop")], skipped: [], toInstall: [brew("neovim")] }

		await promptConfirmation.confirm(request({ adoptTarget: group("core"), mode: "adopt", plan }))

		expect(info.mock.calls).toEqual([["Install: neovim"], ['Adopt into "core": htop']])
		expect(info.mock.invocationCallOrder[1]).toBeLessThan(
			confirmMock.mock.invocationCallOrder[0] ?? 0,
		)
	})

	it("returns the answer", async () => {
		vi.spyOn(consola, "info").mockImplementation(() => undefined)
		confirmMock.mockResolvedValue(true)

		expect(await promptConfirmation.confirm(request())).toBe(true)
		expect(confirmMock).toHaveBeenCalledWith({
			initialValue: false,
			message: "Install 1 package(s) and uninstall 2 extra package(s) (htop, zoom) on work?",
		})
	})

	it("treats a cancelled prompt as denial", async () => {
		vi.spyOn(consola, "info").mockImplementation(() => undefined)
		confirmMock.mockResolvedValue(Symbol("cancel"))

		expect(await promptConfirmation.confirm(request())).toBe(false)
	})
})
