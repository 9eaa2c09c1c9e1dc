import { realpath } from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath, Entry, EntryId } from "@assetry/core"
import { createBackup } from "@/backup/backup"
import { isSymlinkOnlyDirectory } from "@/backup/managed"
import { isWithin, resolveDestination, resolveRecordedDest } from "@/install/destination"
import { type IoResult, ioFailure, isNotFound, removePath, safeLstat, toAbsolutePath } from "@/io/fs"
import type { Lockfile } from "@/lockfile/types"
import type { InstallContext } from "@/types/context"

export interface OrphanCandidate {
	entryId: EntryId
	previousDest: AbsolutePath
	currentDest: AbsolutePath
}

export type OrphanRemoval =
	| { kind: "symlink" }
	| { kind: "symlink_tree" }
	| { kind: "backed_up"; backup: AbsolutePath }

export interface OrphanCleanup {
	removed: AbsolutePath[]
	warnings: string[]
}

/**
 * Resolve symlinks in every existing ancestor of targetPath. The final
 * component is kept as written, so a destination that is itself a link is
 * compared by location. Missing components are appended unchanged.
 */
export async function canonicalizePath(targetPath: string): Promise<IoResult<AbsolutePath>> {
	const absolute = toAbsolutePath(targetPath)
	const missing: string[] = [path.basename(absolute)]
	let current = path.dirname(absolute)

	while (true) {
		try {
			const resolved = await realpath(current)
			return { ok: true, value: toAbsolutePath(path.join(resolved, ...missing)) }
		} catch (error) {
			if (!isNotFound(error)) {
				return ioFailure("realpath", current, `Unable to resolve ${current}.`, error)
			}
		}

		const parent = path.dirname(current)
		if (parent === current) {
			return { ok: true, value: absolute }
		}
		missing.unshift(path.basename(current))
		current = parent
	}
}

/**
 * Destinations recorded in the lockfile that an entry no longer installs to.
 *
 * Only ids present in both the entry list and the lockfile are compared.
 * Pairs where one path contains the other are never reported.
 */
export async function detectOrphans(
	entries: Entry[],
	lockfile: Lockfile,
	baseDir: AbsolutePath,
): Promise<IoResult<OrphanCandidate[]>> {
	const candidates: OrphanCandidate[] = []

	for (const entry of entries) {
		const locked = lockfile.entries.get(entry.id)
		if (!locked) {
			continue
		}

		const previous = await canonicalizePath(resolveRecordedDest(baseDir, locked.dest))
		if (!previous.ok) {
			return previous
		}
		const current = await canonicalizePath(resolveDestination(entry, baseDir))
		if (!current.ok) {
			return current
		}

		if (previous.value === current.value) {
			continue
		}

		const stats = await safeLstat(previous.value)
		if (!stats.ok) {
			return stats
		}
		if (!stats.value) {
			continue
		}

		if (isWithin(previous.value, current.value) || isWithin(current.value, previous.value)) {
			continue
		}

		candidates.push({
			currentDest: current.value,
			entryId: entry.id,
			previousDest: previous.value,
		})
	}

	return { ok: true, value: candidates }
}

/**
 * Delete an orphaned destination. Links and link-only trees go without a
 * backup; anything else is backed up first.
 */
export async function removeOrphan(
	candidate: OrphanCandidate,
	ctx: Pick<InstallContext, "baseDir" | "now">,
): Promise<IoResult<OrphanRemoval>> {
	const target = candidate.previousDest
	const stats = await safeLstat(target)
	if (!stats.ok) {
		return stats
	}

	if (stats.value?.isSymbolicLink()) {
		const removed = await removePath(target)
		return removed.ok ? { ok: true, value: { kind: "symlink" } } : removed
	}

	if (stats.value?.isDirectory()) {
		const linkOnly = await isSymlinkOnlyDirectory(target)
		if (!linkOnly.ok) {
			return linkOnly
		}
		if (linkOnly.value) {
			const removed = await removePath(target)
			return removed.ok ? { ok: true, value: { kind: "symlink_tree" } } : removed
		}
	}

	const backup = await createBackup(ctx.baseDir, target, ctx.now?.())
	if (!backup.ok) {
		return backup
	}
	const removed = await removePath(target)
	if (!removed.ok) {
		return removed
	}
	return { ok: true, value: { backup: backup.value, kind: "backed_up" } }
}

/**
 * Remove confirmed orphans. Dry-run reports, the allow flag removes without
 * asking, an interactive run asks once for the batch, and anything else keeps
 * the paths with a warning. A failed removal is reported as a warning.
 */
export async function cleanupOrphans(
	candidates: OrphanCandidate[],
	ctx: InstallContext,
): Promise<OrphanCleanup> {
	const cleanup: OrphanCleanup = { removed: [], warnings: [] }
	if (candidates.length === 0) {
		return cleanup
	}

	const listed = candidates.map((candidate) => candidate.previousDest).join(", ")

	if (ctx.options.dryRun) {
		for (const candidate of candidates) {
			ctx.logger.info(
				`[dry-run] Would remove ${candidate.previousDest} (${candidate.entryId} moved to ${candidate.currentDest})`,
			)
		}
		return cleanup
	}

	if (!ctx.options.allowOverwrite) {
		if (!ctx.prompter.isInteractive) {
			const warning = `Left previous destinations in place: ${listed}. The lockfile no longer tracks them; remove them by hand.`
			ctx.logger.warn(warning)
			cleanup.warnings.push(warning)
			return cleanup
		}

		const approved = await ctx.prompter.confirm(`Remove previous destinations ${listed}?`)
		if (!approved) {
			ctx.logger.info(`Kept previous destinations: ${listed}`)
			return cleanup
		}
	}

	for (const candidate of candidates) {
		const removal = await removeOrphan(candidate, ctx)
		if (!removal.ok) {
			const warning = `Unable to remove ${candidate.previousDest}: ${removal.error.message}`
			ctx.logger.warn(warning)
			cleanup.warnings.push(warning)
			continue
		}

		if (removal.value.kind === "backed_up") {
			ctx.logger.info(`Removed ${candidate.previousDest} (backup at ${removal.value.backup})`)
		} else {
			ctx.logger.info(`Removed ${candidate.previousDest}`)
		}
		cleanup.removed.push(candidate.previousDest)
	}

	return cleanup
}
