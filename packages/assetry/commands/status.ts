import type { AbsolutePath, Entry, EntryId } from "@assetry/core"
import { computeChecksum } from "@/checksum/checksum"
import { resolveManifest } from "@/commands/manifest-selection"
import type { CommandRuntime } from "@/commands/sync"
import { CommandResult, printOutcome } from "@/commands/types"
import { formatRecordedDest, resolveDestination } from "@/install/destination"
import { isInstallIntact } from "@/install/drift"
import { type IoResult, safeLstat, safeStat } from "@/io/fs"
import { readLockfile, resolveLockfilePath } from "@/lockfile/lockfile"
import type { Lockfile } from "@/lockfile/types"
import { resolveFilesystemSource } from "@/sources/filesystem"
import { createLogger } from "@/utils/logger"

/**
 * - current: installed and intact, source unchanged where it can be checked locally
 * - outdated: a filesystem source changed since the last install
 * - source_missing: a filesystem source no longer exists
 * - drifted: links no longer point where they were installed
 * - moved: the declared destination differs from the recorded one
 * - missing: the recorded destination is gone
 * - not_installed: no lockfile record
 * - stale: a lockfile record no entry declares
 */
export type EntryState =
	| "current"
	| "outdated"
	| "source_missing"
	| "drifted"
	| "moved"
	| "missing"
	| "not_installed"
	| "stale"

export interface EntryStatus {
	id: EntryId
	state: EntryState
	dest: string
}

export async function statusCommand(options: {
	manifest?: string
	verbose: boolean
}): Promise<void> {
	const logger = createLogger(options.verbose)
	const result = await statusWithRuntime(options, { cwd: process.cwd(), logger })
	printOutcome(result, logger)
}

export async function statusWithRuntime(
	options: { manifest?: string },
	runtime: Pick<CommandRuntime, "cwd" | "logger">,
): Promise<CommandResult<EntryStatus[]>> {
	const selection = await resolveManifest(options.manifest, runtime.cwd)
	if (selection.status !== "completed") {
		return selection
	}

	const { baseDir, manifest, manifestPath } = selection.value
	const lockfile = await readLockfile(resolveLockfilePath(manifestPath))
	if (!lockfile.ok) {
		return CommandResult.failed(lockfile.error)
	}
	if (!lockfile.value) {
		return CommandResult.unchanged("Nothing installed yet.")
	}

	const statuses = await collectStatus(manifest.entries, lockfile.value, baseDir)
	if (!statuses.ok) {
		return CommandResult.failed(statuses.error)
	}

	for (const status of statuses.value) {
		runtime.logger.log(`${status.id}  ${status.state}  ${status.dest}`)
	}
	return CommandResult.completed(statuses.value)
}

/** State of every declared entry in declared order, then stale records by id. */
export async function collectStatus(
	entries: Entry[],
	lockfile: Lockfile,
	baseDir: AbsolutePath,
): Promise<IoResult<EntryStatus[]>> {
	const statuses: EntryStatus[] = []

	for (const entry of entries) {
		const destPath = resolveDestination(entry, baseDir)
		const dest = formatRecordedDest(baseDir, destPath)
		const locked = lockfile.entries.get(entry.id)
		if (!locked) {
			statuses.push({ dest, id: entry.id, state: "not_installed" })
			continue
		}

		if (locked.dest !== dest) {
			statuses.push({ dest, id: entry.id, state: "moved" })
			continue
		}

		const stats = await safeLstat(destPath)
		if (!stats.ok) {
			return stats
		}
		if (!stats.value) {
			statuses.push({ dest, id: entry.id, state: "missing" })
			continue
		}

		const source =
			entry.source?.type === "filesystem" ? resolveFilesystemSource(entry.source, baseDir) : undefined
		if (source) {
			const sourceStats = await safeStat(source.path)
			if (!sourceStats.ok) {
				return sourceStats
			}
			if (!sourceStats.value) {
				statuses.push({ dest, id: entry.id, state: "source_missing" })
				continue
			}
		}

		if (!(await isInstallIntact(locked, destPath))) {
			statuses.push({ dest, id: entry.id, state: "drifted" })
			continue
		}

		if (source) {
			const checksum = await computeChecksum(source.path)
			if (!checksum.ok) {
				return checksum
			}
			if (checksum.value !== locked.checksum) {
				statuses.push({ dest, id: entry.id, state: "outdated" })
				continue
			}
		}

		statuses.push({ dest, id: entry.id, state: "current" })
	}

	const declared = new Set<string>(entries.map((entry) => entry.id))
	const stale = [...lockfile.entries.keys()].filter((id) => !declared.has(id)).sort()
	for (const id of stale) {
		statuses.push({ dest: lockfile.entries.get(id)?.dest ?? "", id, state: "stale" })
	}

	return { ok: true, value: statuses }
}
