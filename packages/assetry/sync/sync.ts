import type { AbsolutePath, Entry, EntryId, Result } from "@assetry/core"
import { resolveDestination } from "@/install/destination"
import { installEntry } from "@/install/install"
import type { InstallResult } from "@/install/types"
import {
	createLockfile,
	readLockfile,
	retainLockedEntries,
	upsertLockedEntry,
	writeLockfile,
} from "@/lockfile/lockfile"
import { detectOverlappingDestinations } from "@/manifest/overlap"
import { cleanupOrphans, detectOrphans } from "@/orphan/orphan"
import { failSync } from "@/sync/errors"
import type { SyncOptions, SyncResult, SyncSummary } from "@/sync/types"
import type { AssetryError } from "@/types/errors"

interface EntryFailure {
	entryId: EntryId
	dest: AbsolutePath
	error: AssetryError
}

/**
 * Install every selected entry in declared order and persist the lockfile.
 *
 * The first failing entry stops the run. Entries installed before it keep
 * their lockfile records: the lockfile is written once at the end, failure or
 * not. Orphan cleanup and stale-entry pruning only happen when every entry
 * succeeded. Overlapping destinations are reported up front and never stop
 * the run.
 */
export async function runSync(options: SyncOptions): Promise<SyncResult<SyncSummary>> {
	const { ctx, lockfilePath } = options

	const lockfileResult = await readLockfile(lockfilePath)
	if (!lockfileResult.ok) {
		return failSync("lockfile", lockfileResult.error)
	}
	const lockfile = lockfileResult.value ?? createLockfile()

	const selected = selectEntries(options.entries, options.only)
	if (!selected.ok) {
		return failSync("select", selected.error)
	}

	const orphans = await detectOrphans(selected.value, lockfile, ctx.baseDir)
	if (!orphans.ok) {
		return failSync("orphans", orphans.error)
	}

	const results: InstallResult[] = []
	const warnings = detectOverlappingDestinations(options.entries, ctx.baseDir)
	for (const warning of warnings) {
		ctx.logger.warn(warning)
	}
	let failure: EntryFailure | undefined

	for (const entry of selected.value) {
		const outcome = await installEntry(entry, lockfile, ctx)
		if (!outcome.ok) {
			failure = {
				dest: resolveDestination(entry, ctx.baseDir),
				entryId: entry.id,
				error: outcome.error,
			}
			break
		}

		results.push(outcome.value)
		warnings.push(...outcome.value.warnings)
		if (outcome.value.lockedEntry) {
			upsertLockedEntry(lockfile, entry.id, outcome.value.lockedEntry)
		}
	}

	let orphansRemoved: AbsolutePath[] = []
	let staleRemoved: EntryId[] = []

	if (!failure) {
		const cleanup = await cleanupOrphans(orphans.value, ctx)
		orphansRemoved = cleanup.removed
		warnings.push(...cleanup.warnings)
	}

	if (!ctx.options.dryRun) {
		const fullRun = selected.value.length === options.entries.length
		if (!failure && fullRun) {
			staleRemoved = retainLockedEntries(
				lockfile,
				new Set(options.entries.map((entry) => entry.id)),
			)
			for (const id of staleRemoved) {
				ctx.logger.debug(`Dropped ${id} from the lockfile`)
			}
		}

		const written = await writeLockfile(lockfilePath, lockfile)
		if (!written.ok) {
			if (failure) {
				ctx.logger.error(`Unable to write ${lockfilePath}: ${written.error.message}`)
			} else {
				return failSync("write", written.error)
			}
		}
	}

	if (failure) {
		return failSync("install", failure.error, { dest: failure.dest, entryId: failure.entryId })
	}

	return { ok: true, value: { orphansRemoved, results, staleRemoved, warnings } }
}

/** Entries named by `only`, in declared order. Unknown ids are an error. */
export function selectEntries(
	entries: Entry[],
	only: string[] | undefined,
): Result<Entry[], AssetryError> {
	if (!only || only.length === 0) {
		return { ok: true, value: entries }
	}

	const declared = new Set<string>(entries.map((entry) => entry.id))
	const unknown = only.filter((id) => !declared.has(id))
	if (unknown.length > 0) {
		return {
			error: {
				message: `Unknown entry id: ${unknown.join(", ")}`,
				target: "entry",
				type: "not_found",
			},
			ok: false,
		}
	}

	const wanted = new Set(only)
	return { ok: true, value: entries.filter((entry) => wanted.has(entry.id)) }
}
