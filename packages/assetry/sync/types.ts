import type { AbsolutePath, Entry, EntryId, Result } from "@assetry/core"
import type { InstallResult } from "@/install/types"
import type { InstallContext } from "@/types/context"
import type { AssetryError } from "@/types/errors"

export type SyncStage = "lockfile" | "select" | "orphans" | "install" | "write"

export type SyncError = AssetryError & {
	stage: SyncStage
	entryId?: EntryId
	dest?: AbsolutePath
}

export type SyncResult<T> = Result<T, SyncError>

export interface SyncSummary {
	results: InstallResult[]
	orphansRemoved: AbsolutePath[]
	/** Lockfile ids dropped because no entry declares them anymore. */
	staleRemoved: EntryId[]
	warnings: string[]
}

export interface SyncOptions {
	entries: Entry[]
	lockfilePath: AbsolutePath
	ctx: InstallContext
	/** Restrict the run to these ids. Stale lockfile entries are kept. */
	only?: string[]
}
