import path from "node:path"
import { type IoResult, listDirectory, safeLstat } from "@/io/fs"

/**
 * True when a directory holds nothing but symlinks, at every depth.
 * Such trees are left behind by per-file link installs and are disposable.
 * An empty directory counts as symlink-only.
 */
export async function isSymlinkOnlyDirectory(dirPath: string): Promise<IoResult<boolean>> {
	const entries = await listDirectory(dirPath)
	if (!entries.ok) {
		return entries
	}

	for (const entry of entries.value) {
		if (entry.isSymbolicLink()) {
			continue
		}

		if (!entry.isDirectory()) {
			return { ok: true, value: false }
		}

		const nested = await isSymlinkOnlyDirectory(path.join(dirPath, entry.name))
		if (!nested.ok) {
			return nested
		}
		if (!nested.value) {
			return { ok: true, value: false }
		}
	}

	return { ok: true, value: true }
}

/**
 * Whether writing to targetPath would destroy content a person owns.
 *
 * Absent paths and symlinks never conflict. A directory conflicts unless it is
 * symlink-only. Any other existing path conflicts.
 */
export async function hasConflict(targetPath: string): Promise<IoResult<boolean>> {
	const stats = await safeLstat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (!stats.value || stats.value.isSymbolicLink()) {
		return { ok: true, value: false }
	}

	if (stats.value.isDirectory()) {
		const managed = await isSymlinkOnlyDirectory(targetPath)
		if (!managed.ok) {
			return managed
		}
		return { ok: true, value: !managed.value }
	}

	return { ok: true, value: true }
}
