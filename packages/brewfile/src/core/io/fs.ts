import type { Stats } from "node:fs"
import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import path from "node:path"
import type { IoResult } from "@/src/core/io/types"
import { ioFailure } from "@/src/core/io/types"
import { formatError } from "@/src/utils/errors"

export type { IoError, IoResult } from "@/src/core/io/types"

export async function safeStat(targetPath: string): Promise<IoResult<Stats | null>> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "stat", asError(error))
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return ioFailure(`Expected directory at ${targetPath}.`, targetPath, "mkdir")
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(formatError(error), targetPath, "mkdir", asError(error))
		}
	}

	return { ok: true, value: undefined }
}

/**
 * Read a UTF-8 file. A missing file is `null`, not an error.
 */
export async function readTextFileIfExists(
	targetPath: string,
): Promise<IoResult<string | null>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "readFile", asError(error))
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "writeFile", asError(error))
	}
}

/**
 * Write to a sibling temp file, then rename it over the target, so readers
 * see either the old contents or the new ones.
 */
export async function writeTextFileAtomic(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	const ensured = await ensureDir(path.dirname(targetPath))
	if (!ensured.ok) {
		return ensured
	}

	const tempPath = path.join(
		path.dirname(targetPath),
		`.${path.basename(targetPath)}.${process.pid}.${Date.now()}.tmp`,
	)

	const written = await writeTextFile(tempPath, contents)
	if (!written.ok) {
		await removePath(tempPath)
		return written
	}

	try {
		await rename(tempPath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		await removePath(tempPath)
		return ioFailure(formatError(error), targetPath, "rename", asError(error))
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "rm", asError(error))
	}
}

function isNotFound(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ENOENT"
	)
}

function asError(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined
}
