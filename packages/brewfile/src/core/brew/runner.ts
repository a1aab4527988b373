import { execFile } from "node:child_process"
import { promisify } from "node:util"
import type { CommandRunner, ProcessOutput } from "@/src/core/brew/types"

const execFileAsync = promisify(execFile)

export const COMMAND_NOT_FOUND = 127

const MAX_BUFFER = 32 * 1024 * 1024

export const execFileRunner: CommandRunner = {
	async run(command, args) {
		try {
			const { stdout, stderr } = await execFileAsync(command, [...args], {
				encoding: "utf8",
				maxBuffer: MAX_BUFFER,
			})
			return { code: 0, stderr, stdout }
		} catch (error) {
			return toProcessOutput(error)
		}
	},
}

function toProcessOutput(error: unknown): ProcessOutput {
	if (typeof error !== "object" || error === null) {
		return { code: 1, stderr: String(error), stdout: "" }
	}

	const stdout = "stdout" in error && typeof error.stdout === "string" ? error.stdout : ""
	let stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : ""
	if (!stderr && error instanceof Error) {
		stderr = error.message
	}

	if ("code" in error) {
		if (error.code === "ENOENT") {
			return { code: COMMAND_NOT_FOUND, stderr, stdout }
		}
		if (typeof error.code === "number") {
			return { code: error.code, stderr, stdout }
		}
	}

	return { code: 1, stderr, stdout }
}
