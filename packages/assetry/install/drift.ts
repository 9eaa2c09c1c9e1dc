import path from "node:path"
import type { AbsolutePath } from "@assetry/core"
import { resolveRealPath, safeLstat, safeStat } from "@/io/fs"
import type { LockedEntry } from "@/lockfile/types"

/**
 * Whether a checksum match can be trusted: the destination still exists and,
 * for linked installs, every recorded link still resolves to its item.
 *
 * The link for item lives at `dest/relative(targetPath, item)`. A path that
 * cannot be canonicalized counts as drift.
 */
export async function isInstallIntact(
	locked: LockedEntry,
	destPath: AbsolutePath,
): Promise<boolean> {
	const dest = await safeStat(destPath)
	if (!dest.ok || !dest.value) {
		return false
	}

	if (!locked.isSymlink) {
		return true
	}

	const targetPath = locked.targetPath
	if (!targetPath) {
		return false
	}

	for (const item of locked.symlinkedItems) {
		const relative = path.relative(targetPath, item)
		const linkPath = relative ? path.join(destPath, relative) : destPath

		const link = await safeLstat(linkPath)
		if (!link.ok || !link.value?.isSymbolicLink()) {
			return false
		}

		const actual = await resolveRealPath(linkPath)
		const expected = await resolveRealPath(item)
		if (!actual.ok || !expected.ok || actual.value !== expected.value) {
			return false
		}
	}

	return true
}
