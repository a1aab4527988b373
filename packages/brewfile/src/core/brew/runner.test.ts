import { describe, expect, it } from "vitest"
import { COMMAND_NOT_FOUND, execFileRunner } from "@/src/core/brew/runner"

describe("execFileRunner", () => {
	it("reports a missing executable as exit 127", async () => {
		const output = await execFileRunner.run("brewfile-test-no-such-command", ["--version"])

		expect(output.code).toBe(COMMAND_NOT_FOUND)
	})

	it("returns output and exit status without throwing", async () => {
		const output = await execFileRunner.run(process.execPath, [
			"-e",
			'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)',
		])

		expect(output).toEqual({ code: 3, stderr: "err", stdout: "out" })
	})

	it("captures stdout of a successful run", async () => {
		const output = await execFileRunner.run(process.execPath, ["-e", 'process.stdout.write("ok")'])

		expect(output).toEqual({ code: 0, stderr: "", stdout: "ok" })
	})
})
