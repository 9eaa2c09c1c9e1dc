import type { Dirent, Stats } from "node:fs"
import {
	copyFile,
	lstat,
	mkdir,
	readdir,
	readFile,
	realpath,
	rm,
	stat,
	symlink,
	writeFile,
} from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath } from "@assetry/core"
import type { IoError, IoResult } from "@/io/types"

export type { IoError, IoResult } from "@/io/types"

type StatResult = IoResult<Stats | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure("stat", targetPath, `Unable to access ${targetPath}.`, error)
	}
}

export async function safeLstat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure("lstat", targetPath, `Unable to access ${targetPath}.`, error)
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return {
			error: {
				message: `Expected directory at ${targetPath}.`,
				operation: "mkdir",
				path: toAbsolutePath(targetPath),
				type: "io",
			},
			ok: false,
		}
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure("mkdir", targetPath, `Unable to create ${targetPath}.`, error)
		}
	}

	return { ok: true, value: undefined }
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure("readFile", targetPath, `Unable to read ${targetPath}.`, error)
	}
}

export async function readBytes(targetPath: string): Promise<IoResult<Buffer>> {
	try {
		const contents = await readFile(targetPath)
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure("readFile", targetPath, `Unable to read ${targetPath}.`, error)
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
		return ioFailure("writeFile", targetPath, `Unable to write ${targetPath}.`, error)
	}
}

export async function listDirectory(targetPath: string): Promise<IoResult<Dirent[]>> {
	try {
		const entries = await readdir(targetPath, { withFileTypes: true })
		return { ok: true, value: entries }
	} catch (error) {
		return ioFailure("readdir", targetPath, `Unable to read directory ${targetPath}.`, error)
	}
}

export async function copyFileTo(
	sourcePath: string,
	targetPath: string,
): Promise<IoResult<void>> {
	try {
		await copyFile(sourcePath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(
			"copyFile",
			targetPath,
			`Unable to copy ${sourcePath} to ${targetPath}.`,
			error,
		)
	}
}

export async function createSymlink(
	sourcePath: string,
	targetPath: string,
): Promise<IoResult<void>> {
	try {
		await symlink(sourcePath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(
			"symlink",
			targetPath,
			`Unable to link ${targetPath} -> ${sourcePath}.`,
			error,
		)
	}
}

export async function resolveRealPath(targetPath: string): Promise<IoResult<AbsolutePath>> {
	try {
		const resolved = await realpath(targetPath)
		return { ok: true, value: toAbsolutePath(resolved) }
	} catch (error) {
		return ioFailure("realpath", targetPath, `Unable to resolve ${targetPath}.`, error)
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure("rm", targetPath, `Unable to remove ${targetPath}.`, error)
	}
}

export function toAbsolutePath(value: string): AbsolutePath {
	const resolved = path.isAbsolute(value) ? path.normalize(value) : path.resolve(value)
	return resolved as AbsolutePath
}

export function isNotFound(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		(error as { code?: string }).code === "ENOENT"
	)
}

export function ioFailure(
	operation: string,
	targetPath: string,
	message: string,
	error?: unknown,
): { ok: false; error: IoError } {
	return {
		error: {
			message,
			operation,
			path: toAbsolutePath(targetPath),
			rawError: error instanceof Error ? error : undefined,
			type: "io",
		},
		ok: false,
	}
}
