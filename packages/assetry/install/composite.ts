import path from "node:path"
import type { AbsolutePath, Entry, Result } from "@assetry/core"
import { hashContent } from "@/checksum/checksum"
import { resolveConflicts } from "@/install/conflict"
import { formatRecordedDest, resolveDestination, resolveRecordedDest } from "@/install/destination"
import { isInstallIntact } from "@/install/drift"
import { skippedResult } from "@/install/result"
import type { InstallOutcome } from "@/install/types"
import { ensureDir, readTextFile, removePath, safeStat, writeTextFile } from "@/io/fs"
import type { Lockfile } from "@/lockfile/types"
import { resolveSource } from "@/sources/resolve"
import { useResolvedSource } from "@/sources/types"
import type { InstallContext } from "@/types/context"
import type { AssetryError } from "@/types/errors"

/** Sources joined by a blank line, each without trailing whitespace, one final newline. */
export function composeDocument(parts: string[]): string {
	return `${parts.map((part) => part.trimEnd()).join("\n\n")}\n`
}

/**
 * Build one file out of every listed source and write it like a copied
 * single-file entry. Change detection hashes the generated text.
 */
export async function installComposite(
	entry: Entry,
	lockfile: Lockfile,
	ctx: InstallContext,
): Promise<InstallOutcome> {
	const parts: string[] = []
	const displays: string[] = []

	for (const declaration of entry.sources) {
		const resolved = await resolveSource(declaration, ctx)
		if (!resolved.ok) {
			return resolved
		}

		const text = await useResolvedSource(resolved.value, (source) => readSourceFile(source.path))
		if (!text.ok) {
			return text
		}

		parts.push(text.value)
		displays.push(resolved.value.display)
	}

	const document = composeDocument(parts)
	const checksum = hashContent(document)
	const destPath = resolveDestination(entry, ctx.baseDir)
	const recordedDest = formatRecordedDest(ctx.baseDir, destPath)
	const locked = lockfile.entries.get(entry.id)

	if (
		locked &&
		locked.checksum === checksum &&
		locked.dest === recordedDest &&
		(await isInstallIntact(locked, destPath))
	) {
		ctx.logger.info(`${entry.id} is up to date`)
		return { ok: true, value: skippedResult(entry.id, destPath, false) }
	}

	const previous = locked
		? { checksum: locked.checksum, dest: resolveRecordedDest(ctx.baseDir, locked.dest) }
		: undefined
	const backups = await resolveConflicts([destPath], previous, ctx)
	if (!backups.ok) {
		return backups
	}

	if (ctx.options.dryRun) {
		ctx.logger.info(
			`[dry-run] Would write ${entry.id} to ${destPath} from ${displays.length} source(s)`,
		)
		return {
			ok: true,
			value: {
				backups: backups.value,
				destPath,
				id: entry.id,
				installed: false,
				skippedNoChange: false,
				warnings: [],
				wasSymlink: false,
			},
		}
	}

	const parentReady = await ensureDir(path.dirname(destPath))
	if (!parentReady.ok) {
		return parentReady
	}
	const cleared = await removePath(destPath)
	if (!cleared.ok) {
		return cleared
	}
	const written = await writeTextFile(destPath, document)
	if (!written.ok) {
		return written
	}
	ctx.logger.info(`Wrote ${entry.id} to ${destPath}`)

	const now = ctx.now?.() ?? new Date()
	return {
		ok: true,
		value: {
			backups: backups.value,
			destPath,
			id: entry.id,
			installed: true,
			lockedEntry: {
				checksum,
				dest: recordedDest,
				isSymlink: false,
				lastUpdatedAt: now.toISOString(),
				source: { composite: displays },
				symlinkedItems: [],
			},
			skippedNoChange: false,
			warnings: [],
			wasSymlink: false,
		},
	}
}

async function readSourceFile(sourcePath: AbsolutePath): Promise<Result<string, AssetryError>> {
	const stats = await safeStat(sourcePath)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value?.isFile()) {
		return {
			error: {
				message: `Composite source is not a file: ${sourcePath}`,
				path: sourcePath,
				type: "source_unavailable",
			},
			ok: false,
		}
	}
	return readTextFile(sourcePath)
}
