import type { AbsolutePath, BaseError } from "@brewfile/core"

export type IoErrorType = "io"

export interface IoError extends BaseError {
	type: IoErrorType
	path: AbsolutePath | string
	operation: string
}

export type IoResult<T> = { ok: true; value: T } | { ok: false; error: IoError }

export function ioFailure<T>(
	message: string,
	path: string,
	operation: string,
	rawError?: Error,
): IoResult<T> {
	return {
		error: {
			message,
			operation,
			path,
			rawError,
			type: "io",
		},
		ok: false,
	}
}
