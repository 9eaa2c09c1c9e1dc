import path from "node:path"
import { type AbsolutePath, type Entry, kindTraits, type Result } from "@assetry/core"
import { createBackup } from "@/backup/backup"
import { hasConflict } from "@/backup/managed"
import { computeChecksum } from "@/checksum/checksum"
import { selectItems } from "@/install/materialize"
import { toAbsolutePath } from "@/io/fs"
import type { InstallContext } from "@/types/context"
import type { AssetryError } from "@/types/errors"

/**
 * Paths that must be free (or confirmed) before installing.
 *
 * Per-file link installs of tree kinds share their destination with other
 * sources and check nothing. Patch kinds check only the top-level names they
 * will write.
 */
export async function conflictTargets(
	entry: Pick<Entry, "include" | "kind">,
	sourcePath: AbsolutePath,
	destPath: AbsolutePath,
	useSymlink: boolean,
): Promise<Result<AbsolutePath[], AssetryError>> {
	switch (kindTraits(entry.kind).shape) {
		case "file":
		case "composite":
			return { ok: true, value: [destPath] }
		case "tree":
			return { ok: true, value: useSymlink ? [] : [destPath] }
		case "patch": {
			const items = await selectItems(sourcePath, entry.include)
			if (!items.ok) {
				return items
			}
			return {
				ok: true,
				value: items.value.map((item) => toAbsolutePath(path.join(destPath, item.name))),
			}
		}
	}
}

/** What this entry installed last time, from its lockfile record. */
export interface PreviousInstall {
	dest: AbsolutePath
	checksum: string
}

/**
 * Check targets for foreign content and get permission to replace it.
 *
 * The previous install's destination is ours only while its content still
 * hashes to the recorded checksum; an edited copy is foreign like anything
 * else. Dry-run reports and continues. Otherwise the overwrite needs the allow
 * flag or an interactive yes; approved paths are backed up first. Returns the
 * backup paths.
 */
export async function resolveConflicts(
	targets: AbsolutePath[],
	previous: PreviousInstall | undefined,
	ctx: InstallContext,
): Promise<Result<AbsolutePath[], AssetryError>> {
	const conflicting: AbsolutePath[] = []
	for (const target of targets) {
		if (previous && target === previous.dest) {
			const onDisk = await computeChecksum(target)
			if (!onDisk.ok) {
				return onDisk
			}
			if (onDisk.value === previous.checksum) {
				ctx.logger.debug(`${target} is unchanged since the previous install`)
				continue
			}
		}

		const conflict = await hasConflict(target)
		if (!conflict.ok) {
			return conflict
		}
		if (conflict.value) {
			conflicting.push(target)
		}
	}

	if (conflicting.length === 0) {
		return { ok: true, value: [] }
	}

	const listed = conflicting.join(", ")
	if (ctx.options.dryRun) {
		ctx.logger.info(`[dry-run] Would back up and overwrite ${listed}`)
		return { ok: true, value: [] }
	}

	if (!ctx.options.allowOverwrite) {
		const [first] = conflicting
		if (!first) {
			return { ok: true, value: [] }
		}

		if (!ctx.prompter.isInteractive) {
			return {
				error: {
					message: `${listed} already exists. Re-run with --yes to back it up and overwrite it.`,
					path: first,
					reason: "overwrite_not_allowed",
					type: "conflict",
				},
				ok: false,
			}
		}

		const approved = await ctx.prompter.confirm(`Overwrite existing content at ${listed}?`)
		if (!approved) {
			return {
				error: { message: `Kept existing content at ${listed}.`, path: first, type: "cancelled" },
				ok: false,
			}
		}
	}

	const backups: AbsolutePath[] = []
	for (const target of conflicting) {
		const backup = await createBackup(ctx.baseDir, target, ctx.now?.())
		if (!backup.ok) {
			return backup
		}
		ctx.logger.info(`Backed up ${target} to ${backup.value}`)
		backups.push(backup.value)
	}

	return { ok: true, value: backups }
}
