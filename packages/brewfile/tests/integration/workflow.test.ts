import { readFile } from "node:fs/promises"
import { beforeEach, describe, expect, it } from "vitest"
import { runAdd } from "@/src/commands/add"
import { runDump } from "@/src/commands/dump"
import { runInit } from "@/src/commands/init"
import { runRemove } from "@/src/commands/remove"
import { runStatus } from "@/src/commands/status"
import { runSyncCommand } from "@/src/commands/sync"
import { autoApprove } from "@/src/core/sync/confirm"
import { brew, buildContext, cask, FakeBackend, pathIn, readJson, withTempDir } from "@/tests/helpers"

describe("a machine from init to Brewfile", () => {
	beforeEach(() => {
		process.exitCode = undefined
	})

	it("adopts what is installed, then cleans up after a removal", async () => {
		await withTempDir(async (dir) => {
			const backend = new FakeBackend({
				installed: [brew("git"), cask("firefox")],
				knownFormulas: ["ripgrep"],
			})
			const context = buildContext(dir, backend)

			await runInit(context, { nonInteractive: true })
			await runSyncCommand(context, "adopt", { confirmation: autoApprove, dryRun: false })
			await runAdd(context, "ripgrep", { install: true })

			expect(await readJson(context.configPath)).toEqual({
				groups: {
					core: { brews: ["git", "ripgrep"], casks: ["firefox"], mas: [], taps: [] },
				},
				machines: { work: ["core"] },
				version: "1.0",
			})
			expect(backend.packages).toEqual([brew("git"), brew("ripgrep"), cask("firefox")])

			await runRemove(context, "firefox", { keepInstalled: true })
			const cleanup = await runSyncCommand(context, "cleanup", {
				confirmation: autoApprove,
				dryRun: false,
			})

			expect(cleanup.status).toBe("completed")
			expect(backend.log).toEqual(["install ripgrep", "uninstall firefox"])

			const status = await runStatus(context)
			expect(status.status === "completed" && status.value.report.inSync).toBe(true)

			const brewfile = pathIn(dir, "Brewfile")
			await runDump(context, brewfile)
			expect(await readFile(brewfile, "utf8")).toBe('brew "git"\nbrew "ripgrep"\n')
		})
	})
})
