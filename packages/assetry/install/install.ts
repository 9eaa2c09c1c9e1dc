import {
	type AbsolutePath,
	type Entry,
	formatSourceLocation,
	type GitSourceDeclaration,
	isDirectoryKind,
	kindTraits,
} from "@assetry/core"
import { computeChecksum } from "@/checksum/checksum"
import { installComposite } from "@/install/composite"
import { conflictTargets, resolveConflicts } from "@/install/conflict"
import { formatRecordedDest, resolveDestination, resolveRecordedDest } from "@/install/destination"
import { isInstallIntact } from "@/install/drift"
import { materialize, materializeMode } from "@/install/materialize"
import { skippedResult } from "@/install/result"
import type { InstallOutcome, UpgradeInfo } from "@/install/types"
import { validateStructure } from "@/install/validate"
import { safeLstat, safeStat } from "@/io/fs"
import type { LockedEntry, Lockfile } from "@/lockfile/types"
import { resolveFilesystemSource } from "@/sources/filesystem"
import { queryRemoteCommit, resolveGitCommit, resolveGitSource } from "@/sources/git"
import type { ResolvedSource, SourceResult } from "@/sources/types"
import { useResolvedSource } from "@/sources/types"
import type { InstallContext } from "@/types/context"

/**
 * Install one entry. Reads the lockfile but never writes it: the caller
 * records `lockedEntry` from the result.
 */
export async function installEntry(
	entry: Entry,
	lockfile: Lockfile,
	ctx: InstallContext,
): Promise<InstallOutcome> {
	ctx.logger.debug(`Processing entry ${entry.id}`)

	if (kindTraits(entry.kind).shape === "composite") {
		return installComposite(entry, lockfile, ctx)
	}

	const source = entry.source
	if (!source) {
		return {
			error: {
				field: "source",
				message: `Entry "${entry.id}" has no source.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const destPath = resolveDestination(entry, ctx.baseDir)
	const locked = lockfile.entries.get(entry.id)

	if (source.type === "filesystem") {
		const resolved = resolveFilesystemSource(source, ctx.baseDir)
		return installResolved(entry, resolved, destPath, locked, ctx)
	}

	const destStats = await safeLstat(destPath)
	if (!destStats.ok) {
		return destStats
	}
	// Both shortcuts trust the record only for the destination it describes.
	const installedHere =
		destStats.value !== null &&
		locked?.dest === formatRecordedDest(ctx.baseDir, destPath)
	let resolved: SourceResult<ResolvedSource>
	let upgradeAvailable: UpgradeInfo | undefined

	if (!ctx.options.upgrade && locked?.commit) {
		if (installedHere) {
			const remote = await queryRemoteCommit(source, ctx)
			if (remote && remote.commit !== locked.commit) {
				ctx.logger.info(
					`${entry.id}: upgrade available (${shortCommit(locked.commit)} -> ${shortCommit(remote.commit)})`,
				)
				upgradeAvailable = { availableCommit: remote.commit, currentCommit: locked.commit }
			}
			ctx.logger.info(`${entry.id} is up to date (locked at ${shortCommit(locked.commit)})`)
			return { ok: true, value: skippedResult(entry.id, destPath, false, upgradeAvailable) }
		}

		resolved = await resolveGitCommit(
			source,
			{ commit: locked.commit, resolvedRef: locked.resolvedRef ?? source.ref },
			ctx,
		)
	} else {
		const remote = await queryRemoteCommit(source, ctx)
		if (remote && installedHere && locked?.commit === remote.commit) {
			ctx.logger.info(`${entry.id} is up to date (${shortCommit(remote.commit)})`)
			return { ok: true, value: skippedResult(entry.id, destPath, false) }
		}
		resolved = await fetchLatest(source, ctx)
	}

	if (!resolved.ok) {
		return resolved
	}

	return useResolvedSource(resolved.value, (src) =>
		installResolved(entry, src, destPath, locked, ctx),
	)
}

async function fetchLatest(
	source: GitSourceDeclaration,
	ctx: InstallContext,
): Promise<SourceResult<ResolvedSource>> {
	ctx.logger.info(`Fetching ${formatSourceLocation(source)}`)
	return resolveGitSource(source, ctx)
}

async function installResolved(
	entry: Entry,
	resolved: ResolvedSource,
	destPath: AbsolutePath,
	locked: LockedEntry | undefined,
	ctx: InstallContext,
): Promise<InstallOutcome> {
	const sourceStats = await safeStat(resolved.path)
	if (!sourceStats.ok) {
		return sourceStats
	}
	if (!sourceStats.value) {
		return {
			error: {
				message: `Source path does not exist: ${resolved.path}`,
				path: resolved.path,
				type: "source_unavailable",
			},
			ok: false,
		}
	}

	const expectsDirectory = isDirectoryKind(entry.kind)
	if (expectsDirectory !== sourceStats.value.isDirectory()) {
		return {
			error: {
				field: "source",
				message: `Source for ${entry.kind} must be a ${expectsDirectory ? "directory" : "file"}: ${resolved.path}`,
				path: resolved.path,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const checksum = await computeChecksum(resolved.path)
	if (!checksum.ok) {
		return checksum
	}
	ctx.logger.debug(`${entry.id}: source checksum ${checksum.value}`)

	const recordedDest = formatRecordedDest(ctx.baseDir, destPath)
	if (
		locked &&
		locked.checksum === checksum.value &&
		locked.dest === recordedDest &&
		locked.isSymlink === resolved.useSymlink &&
		(await isInstallIntact(locked, destPath))
	) {
		ctx.logger.info(`${entry.id} is up to date`)
		return { ok: true, value: skippedResult(entry.id, destPath, resolved.useSymlink) }
	}

	const targets = await conflictTargets(entry, resolved.path, destPath, resolved.useSymlink)
	if (!targets.ok) {
		return targets
	}

	const previous = locked
		? { checksum: locked.checksum, dest: resolveRecordedDest(ctx.baseDir, locked.dest) }
		: undefined
	const backups = await resolveConflicts(targets.value, previous, ctx)
	if (!backups.ok) {
		return backups
	}

	const structure = await validateStructure(entry.kind, resolved.path, ctx.options.strict)
	if (!structure.ok) {
		return structure
	}
	for (const warning of structure.value) {
		ctx.logger.warn(warning)
	}

	const mode = materializeMode(entry.kind, resolved.useSymlink)
	if (ctx.options.dryRun) {
		ctx.logger.info(`[dry-run] Would install ${entry.id} to ${destPath} (${mode})`)
		return {
			ok: true,
			value: {
				backups: backups.value,
				destPath,
				id: entry.id,
				installed: false,
				skippedNoChange: false,
				warnings: structure.value,
				wasSymlink: resolved.useSymlink,
			},
		}
	}

	const linked = await materialize(mode, resolved.path, destPath, entry.include)
	if (!linked.ok) {
		return linked
	}
	ctx.logger.info(
		`${resolved.useSymlink ? "Linked" : "Installed"} ${entry.id} to ${destPath}`,
	)

	const now = ctx.now?.() ?? new Date()
	return {
		ok: true,
		value: {
			backups: backups.value,
			destPath,
			id: entry.id,
			installed: true,
			lockedEntry: {
				checksum: checksum.value,
				commit: resolved.git?.commit,
				dest: recordedDest,
				isSymlink: resolved.useSymlink,
				lastUpdatedAt: now.toISOString(),
				resolvedRef: resolved.git?.resolvedRef,
				source: resolved.display,
				symlinkedItems: resolved.useSymlink ? linked.value : [],
				targetPath: resolved.useSymlink ? resolved.path : undefined,
			},
			skippedNoChange: false,
			warnings: structure.value,
			wasSymlink: resolved.useSymlink,
		},
	}
}

function shortCommit(commit: string): string {
	return commit.slice(0, 8)
}
