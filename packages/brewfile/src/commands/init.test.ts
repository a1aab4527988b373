import { multiselect } from "@clack/prompts"
import { afterEach, describe, expect, it, vi } from "vitest"
import { parseGroupList, runInit } from "@/src/commands/init"
import { buildContext, FakeBackend, readJson, withTempDir, writeConfigDocument } from "@/tests/helpers"

vi.mock("@clack/prompts", () => ({
	isCancel: (value: unknown) => typeof value === "symbol",
	multiselect: vi.fn(),
}))

const multiselectMock = vi.mocked(multiselect)

const twoGroups = {
	groups: { core: { brews: ["git"] }, work: { casks: ["slack"] } },
	machines: { laptop: ["core"] },
	version: "1.0",
}

describe("runInit", () => {
	afterEach(() => {
		multiselectMock.mockReset()
	})

	it("creates the file with an empty core group", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())

			const result = await runInit(context, { nonInteractive: true })

			expect(result).toEqual({ status: "completed", value: { created: true, groups: ["core"] } })
			expect(await readJson(context.configPath)).toEqual({
				groups: { core: { brews: [], casks: [], mas: [], taps: [] } },
				machines: { work: ["core"] },
				version: "1.0",
			})
		})
	})

	it("assigns groups from --groups", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())
			await writeConfigDocument(context, twoGroups)

			const result = await runInit(context, { groups: "work, core", nonInteractive: true })

			expect(result).toEqual({
				status: "completed",
				value: { created: false, groups: ["work", "core"] },
			})
			expect(await readJson(context.configPath)).toMatchObject({
				machines: { laptop: ["core"], work: ["work", "core"] },
			})
		})
	})

	it("rejects an unknown group", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())
			await writeConfigDocument(context, twoGroups)

			await expect(runInit(context, { groups: "games", nonInteractive: true })).rejects.toThrow(
				'Group "games" does not exist.',
			)
		})
	})

	it("asks for groups interactively", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())
			await writeConfigDocument(context, twoGroups)
			multiselectMock.mockResolvedValue(["core"])

			const result = await runInit(context, { nonInteractive: false })

			expect(result).toEqual({ status: "completed", value: { created: false, groups: ["core"] } })
			expect(multiselectMock).toHaveBeenCalledWith({
				initialValues: [],
				message: "Select groups for work",
				options: [
					{ label: "core (1 packages)", value: "core" },
					{ label: "work (1 packages)", value: "work" },
				],
				required: true,
			})
		})
	})

	it("returns cancelled when the prompt is cancelled", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())
			await writeConfigDocument(context, twoGroups)
			multiselectMock.mockResolvedValue(Symbol("cancel"))

			expect(await runInit(context, { nonInteractive: false })).toEqual({ status: "cancelled" })
		})
	})

	it("needs --groups when non-interactive and the machine has none", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())
			await writeConfigDocument(context, twoGroups)

			await expect(runInit(context, { nonInteractive: true })).rejects.toThrow(
				"Pass --groups <a,b> to choose groups in non-interactive mode.",
			)
		})
	})

	it("leaves an already configured machine unchanged", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend(), "laptop")
			await writeConfigDocument(context, twoGroups)

			expect(await runInit(context, { nonInteractive: true })).toEqual({
				reason: "laptop already uses groups: core.",
				status: "unchanged",
			})
		})
	})
})

describe("parseGroupList", () => {
	it("trims, skips blanks and dedupes", () => {
		expect(parseGroupList(" core,,work , core")).toEqual(["core", "work"])
	})

	it("rejects names with spaces", () => {
		expect(() => parseGroupList("my group")).toThrow('Invalid group name "my group".')
	})
})
