import path from "node:path"
import {
	type AbsolutePath,
	coerceEntryId,
	type EntryId,
	LOCKFILE_FILENAME,
	LOCKFILE_VERSION,
} from "@assetry/core"
import { parse, stringify, TomlError } from "smol-toml"
import { z } from "zod"
import { type IoResult, readTextFile, safeStat, toAbsolutePath, writeTextFile } from "@/io/fs"
import type { LockedEntry, Lockfile, LockfileResult } from "@/lockfile/types"

const TimestampSchema = z
	.union([z.string().min(1), z.date()])
	.transform((value) => (typeof value === "string" ? value : value.toISOString()))

const LockedEntrySchema = z
	.object({
		checksum: z.string().min(1),
		commit: z.string().min(1).optional(),
		dest: z.string().min(1),
		is_symlink: z.boolean().default(false),
		last_updated_at: TimestampSchema,
		resolved_ref: z.string().min(1).optional(),
		source: z.union([
			z.string().min(1),
			z.object({ composite: z.array(z.string().min(1)) }).strict(),
		]),
		symlinked_items: z.array(z.string().min(1)).default([]),
		target_path: z.string().min(1).optional(),
	})
	.strict()

const LockfileSchema = z
	.object({
		entries: z.record(z.string(), LockedEntrySchema).default({}),
		version: z.number().int(),
	})
	.strict()

export function resolveLockfilePath(manifestPath: AbsolutePath): AbsolutePath {
	return toAbsolutePath(path.join(path.dirname(manifestPath), LOCKFILE_FILENAME))
}

export function createLockfile(): Lockfile {
	return { entries: new Map(), version: LOCKFILE_VERSION }
}

export function upsertLockedEntry(lockfile: Lockfile, id: EntryId, entry: LockedEntry): void {
	lockfile.entries.set(id, entry)
}

/** Drop every entry whose id is not in keep. Returns the removed ids, sorted. */
export function retainLockedEntries(lockfile: Lockfile, keep: ReadonlySet<string>): EntryId[] {
	const removed: EntryId[] = []
	for (const id of lockfile.entries.keys()) {
		if (!keep.has(id)) {
			removed.push(id)
		}
	}
	for (const id of removed) {
		lockfile.entries.delete(id)
	}
	return removed.sort()
}

/**
 * Read the lockfile. A missing file yields null.
 */
export async function readLockfile(
	lockfilePath: AbsolutePath,
): Promise<LockfileResult<Lockfile | null>> {
	const stats = await safeStat(lockfilePath)
	if (!stats.ok) {
		return stats
	}

	if (!stats.value) {
		return { ok: true, value: null }
	}

	const contents = await readTextFile(lockfilePath)
	if (!contents.ok) {
		return contents
	}

	return parseLockfile(contents.value, lockfilePath)
}

export function parseLockfile(
	contents: string,
	lockfilePath: AbsolutePath,
): LockfileResult<Lockfile> {
	let raw: unknown
	try {
		raw = parse(contents)
	} catch (error) {
		const detail = error instanceof TomlError ? error.message : String(error)
		return {
			error: {
				message: `Invalid TOML in lockfile: ${detail}`,
				path: lockfilePath,
				rawError: error instanceof Error ? error : undefined,
				source: LOCKFILE_FILENAME,
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = LockfileSchema.safeParse(raw)
	if (!parsed.success) {
		return {
			error: {
				field: "lockfile",
				message: "Lockfile validation failed.",
				path: lockfilePath,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	if (parsed.data.version !== LOCKFILE_VERSION) {
		return {
			error: {
				field: "version",
				message: `Unsupported lockfile version ${parsed.data.version}.`,
				path: lockfilePath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const entries = new Map<EntryId, LockedEntry>()
	for (const [key, record] of Object.entries(parsed.data.entries)) {
		const id = coerceEntryId(key)
		if (!id) {
			return {
				error: {
					field: "entries",
					message: `Invalid entry id "${key}" in lockfile.`,
					path: lockfilePath,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}

		entries.set(id, {
			checksum: record.checksum,
			commit: record.commit,
			dest: record.dest,
			isSymlink: record.is_symlink,
			lastUpdatedAt: record.last_updated_at,
			resolvedRef: record.resolved_ref,
			source: record.source,
			symlinkedItems: record.symlinked_items,
			targetPath: record.target_path,
		})
	}

	return { ok: true, value: { entries, version: parsed.data.version } }
}

/**
 * Entries are written sorted by id. `is_symlink` is omitted when false and
 * `symlinked_items` when empty. Scalar keys come out in insertion order.
 */
export function serializeLockfile(lockfile: Lockfile): string {
	const entries: Record<string, Record<string, unknown>> = {}
	const ids = [...lockfile.entries.keys()].sort()
	for (const id of ids) {
		const entry = lockfile.entries.get(id)
		if (entry) {
			entries[id] = serializeEntry(entry)
		}
	}

	return `${stringify({ entries, version: lockfile.version })}\n`
}

export async function writeLockfile(
	lockfilePath: AbsolutePath,
	lockfile: Lockfile,
): Promise<IoResult<void>> {
	return writeTextFile(lockfilePath, serializeLockfile(lockfile))
}

function serializeEntry(entry: LockedEntry): Record<string, unknown> {
	const output: Record<string, unknown> = {}
	output.source = entry.source
	output.dest = entry.dest
	if (entry.resolvedRef) {
		output.resolved_ref = entry.resolvedRef
	}
	if (entry.commit) {
		output.commit = entry.commit
	}
	output.last_updated_at = entry.lastUpdatedAt
	output.checksum = entry.checksum
	if (entry.isSymlink) {
		output.is_symlink = true
	}
	if (entry.targetPath) {
		output.target_path = entry.targetPath
	}
	if (entry.symlinkedItems.length > 0) {
		output.symlinked_items = entry.symlinkedItems
	}
	return output
}
