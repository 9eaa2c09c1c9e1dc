import type { EntryId } from "./branded"

const ENTRY_ID_INVALID_CHARS = /[/\\]/

/** Ids name lockfile keys and backup files, so they may not contain separators. */
export function coerceEntryId(value: string): EntryId | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (ENTRY_ID_INVALID_CHARS.test(trimmed)) return null
	return trimmed as EntryId
}
