import { writeFile } from "node:fs/promises"
import { describe, expect, it, vi } from "vitest"
import { runEdit } from "@/src/commands/edit"
import { buildContext, FakeBackend, withTempDir, writeConfigDocument } from "@/tests/helpers"

describe("runEdit", () => {
	it("opens the file and validates it afterwards", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())
			await writeConfigDocument(context, { groups: {}, machines: {}, version: "1.0" })
			const launch = vi.fn(async () => 0)

			const result = await runEdit(context, { editor: "vim", launch })

			expect(result).toEqual({ status: "completed", value: undefined })
			expect(launch).toHaveBeenCalledWith("vim", context.configPath)
		})
	})

	it("reports a configuration broken by the edit", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())
			await writeConfigDocument(context, { version: "1.0" })
			const launch = vi.fn(async (_editor: string, filePath: string) => {
				await writeFile(filePath, JSON.stringify({ machines: { work: ["ghost"] } }))
				return 0
			})

			await expect(runEdit(context, { editor: "nano", launch })).rejects.toThrow(
				'Machine "work" references undefined group "ghost".',
			)
		})
	})

	it("fails when the editor exits non-zero", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())
			await writeConfigDocument(context, { version: "1.0" })

			await expect(
				runEdit(context, { editor: "nano", launch: async () => 2 }),
			).rejects.toThrow("nano exited with code 2.")
		})
	})

	it("requires the file to exist", async () => {
		await withTempDir(async (dir) => {
			const context = buildContext(dir, new FakeBackend())
			const launch = vi.fn(async () => 0)

			await expect(runEdit(context, { editor: "nano", launch })).rejects.toThrow(
				"Run `brewfile init` first.",
			)
			expect(launch).not.toHaveBeenCalled()
		})
	})
})
