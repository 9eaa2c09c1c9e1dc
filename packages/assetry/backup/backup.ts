import { cp } from "node:fs/promises"
import path from "node:path"
import { type AbsolutePath, BACKUP_DIRNAME } from "@assetry/core"
import {
	copyFileTo,
	ensureDir,
	type IoResult,
	ioFailure,
	removePath,
	safeLstat,
	toAbsolutePath,
} from "@/io/fs"

/** `YYYY-MM-DD-HHMM` in local time. */
export function formatBackupTimestamp(now: Date): string {
	const pad = (value: number) => String(value).padStart(2, "0")
	const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`
	return `${date}-${pad(now.getHours())}${pad(now.getMinutes())}`
}

/**
 * Backup file name for targetPath: its location relative to baseDir with
 * separators flattened to `-`, plus a minute timestamp. Paths outside baseDir
 * are flattened from their absolute form without the leading separator.
 */
export function backupName(baseDir: string, targetPath: string, now: Date): string {
	const relative = path.relative(baseDir, targetPath)
	const outside =
		relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)
	const location = outside ? targetPath.replace(/^[/\\]+/, "") : relative
	return `${location.replace(/[/\\]/g, "-")}-${formatBackupTimestamp(now)}`
}

/**
 * Copy a file or directory into `<baseDir>/.assetry-backups/`.
 * A backup with the same name (same path, same minute) is replaced.
 */
export async function createBackup(
	baseDir: AbsolutePath,
	targetPath: string,
	now: Date = new Date(),
): Promise<IoResult<AbsolutePath>> {
	const backupRoot = path.join(baseDir, BACKUP_DIRNAME)
	const ensured = await ensureDir(backupRoot)
	if (!ensured.ok) {
		return ensured
	}

	const backupPath = toAbsolutePath(path.join(backupRoot, backupName(baseDir, targetPath, now)))
	const cleared = await removePath(backupPath)
	if (!cleared.ok) {
		return cleared
	}

	const stats = await safeLstat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (!stats.value) {
		return ioFailure("backup", targetPath, `Nothing to back up at ${targetPath}.`)
	}

	if (stats.value.isDirectory()) {
		try {
			await cp(targetPath, backupPath, { recursive: true, verbatimSymlinks: true })
		} catch (error) {
			return ioFailure("backup", targetPath, `Unable to back up ${targetPath}.`, error)
		}
		return { ok: true, value: backupPath }
	}

	const copied = await copyFileTo(targetPath, backupPath)
	if (!copied.ok) {
		return copied
	}

	return { ok: true, value: backupPath }
}
