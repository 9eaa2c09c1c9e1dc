import type { EntryId, Result } from "@assetry/core"
import type { IoError, ParseError, ValidationError } from "@/types/errors"

/** Provenance: a display string, or the ordered sources of a composite entry. */
export type LockedSource = string | { composite: string[] }

export interface LockedEntry {
	source: LockedSource
	/** Destination as recorded: relative to the base directory when inside it. */
	dest: string
	resolvedRef?: string
	commit?: string
	/** ISO-8601 timestamp. */
	lastUpdatedAt: string
	checksum: string
	isSymlink: boolean
	targetPath?: string
	symlinkedItems: string[]
}

export interface Lockfile {
	version: number
	entries: Map<EntryId, LockedEntry>
}

export type LockfileError = IoError | ParseError | ValidationError

export type LockfileResult<T> = Result<T, LockfileError>
