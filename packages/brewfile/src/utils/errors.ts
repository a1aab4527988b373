/**
 * Turn anything thrown or returned as an error into one log line.
 */
export function formatError(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}

	if (typeof error === "object" && error !== null && "message" in error) {
		const { message } = error
		if (typeof message === "string" && message.trim()) {
			return message
		}
	}

	if (typeof error === "string" && error.trim()) {
		return error
	}

	return "Unexpected error."
}
