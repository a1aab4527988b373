import { consola } from "consola"

export const EXIT_FAILURE = 1
export const EXIT_PARTIAL_FAILURE = 2

// CommandResult models user-facing flow outcomes; core operations keep { ok, value } results.
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "unchanged"; reason: string }
	| { status: "cancelled" }
	| { status: "failed"; exitCode: number }

export const CommandResult = {
	cancelled: (): CommandResult<never> => ({ status: "cancelled" }),
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (exitCode: number = EXIT_FAILURE): CommandResult<never> => ({
		exitCode,
		status: "failed",
	}),
	unchanged: (reason: string): CommandResult<never> => ({
		reason,
		status: "unchanged",
	}),
} as const

export function printOutcome(result: CommandResult<unknown>): void {
	switch (result.status) {
		case "completed":
			consola.success("Done.")
			break
		case "unchanged":
			consola.info(result.reason)
			break
		case "cancelled":
			consola.info("Canceled.")
			break
		case "failed":
			process.exitCode = result.exitCode
			break
	}
}

export interface GlobalOptions {
	config?: string
	host?: string
}
