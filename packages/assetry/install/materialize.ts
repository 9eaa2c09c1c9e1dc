import type { Dirent } from "node:fs"
import { cp, mkdir } from "node:fs/promises"
import path from "node:path"
import { type AbsolutePath, type AssetKind, kindTraits } from "@assetry/core"
import {
	copyFileTo,
	createSymlink,
	ensureDir,
	type IoResult,
	ioFailure,
	listDirectory,
	removePath,
	safeLstat,
	toAbsolutePath,
} from "@/io/fs"

/**
 * - link-file / copy-file: one file
 * - link-tree: per-file symlinks below real directories
 * - copy-tree: destination replaced by a copy
 * - merge-tree: copy over the destination, keeping what the source does not name
 */
export type MaterializeMode = "link-file" | "copy-file" | "link-tree" | "copy-tree" | "merge-tree"

export function materializeMode(kind: AssetKind, useSymlink: boolean): MaterializeMode {
	switch (kindTraits(kind).shape) {
		case "file":
		case "composite":
			return useSymlink ? "link-file" : "copy-file"
		case "tree":
			return useSymlink ? "link-tree" : "copy-tree"
		case "patch":
			return useSymlink ? "link-tree" : "merge-tree"
	}
}

/**
 * Top-level source items whose name starts with one of the prefixes (all items
 * when there are none), sorted by name.
 */
export async function selectItems(
	sourceDir: string,
	include: string[],
): Promise<IoResult<Dirent[]>> {
	const entries = await listDirectory(sourceDir)
	if (!entries.ok) {
		return entries
	}

	const selected = entries.value.filter(
		(entry) => include.length === 0 || include.some((prefix) => entry.name.startsWith(prefix)),
	)
	selected.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
	return { ok: true, value: selected }
}

/**
 * Write the source to the destination. Returns the source paths that were
 * linked individually (empty for copies).
 */
export async function materialize(
	mode: MaterializeMode,
	sourcePath: AbsolutePath,
	destPath: AbsolutePath,
	include: string[],
): Promise<IoResult<AbsolutePath[]>> {
	const parentReady = await ensureDir(path.dirname(destPath))
	if (!parentReady.ok) {
		return parentReady
	}

	switch (mode) {
		case "link-file": {
			const linked = await replaceWithLink(sourcePath, destPath)
			if (!linked.ok) {
				return linked
			}
			return { ok: true, value: [sourcePath] }
		}
		case "copy-file": {
			const copied = await replaceWithFile(sourcePath, destPath)
			if (!copied.ok) {
				return copied
			}
			return { ok: true, value: [] }
		}
		case "link-tree":
			return linkTree(sourcePath, destPath, include)
		case "copy-tree":
			return copyTree(sourcePath, destPath, include)
		case "merge-tree":
			return mergeTree(sourcePath, destPath, include)
	}
}

async function linkTree(
	sourcePath: string,
	destPath: string,
	include: string[],
): Promise<IoResult<AbsolutePath[]>> {
	const items = await selectItems(sourcePath, include)
	if (!items.ok) {
		return items
	}

	const ready = await ensureRealDirectory(destPath)
	if (!ready.ok) {
		return ready
	}

	const linked: AbsolutePath[] = []
	for (const item of items.value) {
		const result = await linkItem(
			path.join(sourcePath, item.name),
			path.join(destPath, item.name),
			item.isDirectory(),
			linked,
		)
		if (!result.ok) {
			return result
		}
	}

	return { ok: true, value: linked }
}

async function linkItem(
	sourcePath: string,
	destPath: string,
	isDirectory: boolean,
	linked: AbsolutePath[],
): Promise<IoResult<void>> {
	if (!isDirectory) {
		const result = await replaceWithLink(sourcePath, destPath)
		if (!result.ok) {
			return result
		}
		linked.push(toAbsolutePath(sourcePath))
		return { ok: true, value: undefined }
	}

	const ready = await ensureRealDirectory(destPath)
	if (!ready.ok) {
		return ready
	}

	const children = await listDirectory(sourcePath)
	if (!children.ok) {
		return children
	}

	for (const child of children.value) {
		const result = await linkItem(
			path.join(sourcePath, child.name),
			path.join(destPath, child.name),
			child.isDirectory(),
			linked,
		)
		if (!result.ok) {
			return result
		}
	}

	return { ok: true, value: undefined }
}

async function copyTree(
	sourcePath: string,
	destPath: string,
	include: string[],
): Promise<IoResult<AbsolutePath[]>> {
	const items = await selectItems(sourcePath, include)
	if (!items.ok) {
		return items
	}

	const removed = await removePath(destPath)
	if (!removed.ok) {
		return removed
	}

	const created = await ensureDir(destPath)
	if (!created.ok) {
		return created
	}

	for (const item of items.value) {
		try {
			await cp(path.join(sourcePath, item.name), path.join(destPath, item.name), {
				recursive: true,
			})
		} catch (error) {
			return ioFailure("copy", destPath, `Unable to copy ${item.name} into ${destPath}.`, error)
		}
	}

	return { ok: true, value: [] }
}

async function mergeTree(
	sourcePath: string,
	destPath: string,
	include: string[],
): Promise<IoResult<AbsolutePath[]>> {
	const items = await selectItems(sourcePath, include)
	if (!items.ok) {
		return items
	}

	const ready = await ensureRealDirectory(destPath)
	if (!ready.ok) {
		return ready
	}

	for (const item of items.value) {
		const result = await mergeItem(
			path.join(sourcePath, item.name),
			path.join(destPath, item.name),
			item.isDirectory(),
		)
		if (!result.ok) {
			return result
		}
	}

	return { ok: true, value: [] }
}

async function mergeItem(
	sourcePath: string,
	destPath: string,
	isDirectory: boolean,
): Promise<IoResult<void>> {
	if (!isDirectory) {
		return replaceWithFile(sourcePath, destPath)
	}

	const ready = await ensureRealDirectory(destPath)
	if (!ready.ok) {
		return ready
	}

	const children = await listDirectory(sourcePath)
	if (!children.ok) {
		return children
	}

	for (const child of children.value) {
		const result = await mergeItem(
			path.join(sourcePath, child.name),
			path.join(destPath, child.name),
			child.isDirectory(),
		)
		if (!result.ok) {
			return result
		}
	}

	return { ok: true, value: undefined }
}

// A symlink or file in the way is removed; an existing real directory is kept.
async function ensureRealDirectory(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeLstat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value?.isDirectory()) {
		return { ok: true, value: undefined }
	}

	if (stats.value) {
		const removed = await removePath(targetPath)
		if (!removed.ok) {
			return removed
		}
	}

	try {
		await mkdir(targetPath, { recursive: true })
	} catch (error) {
		return ioFailure("mkdir", targetPath, `Unable to create ${targetPath}.`, error)
	}
	return { ok: true, value: undefined }
}

async function replaceWithLink(sourcePath: string, destPath: string): Promise<IoResult<void>> {
	const removed = await removePath(destPath)
	if (!removed.ok) {
		return removed
	}
	return createSymlink(sourcePath, destPath)
}

// Never writes through a symlink at destPath.
async function replaceWithFile(sourcePath: string, destPath: string): Promise<IoResult<void>> {
	const removed = await removePath(destPath)
	if (!removed.ok) {
		return removed
	}
	return copyFileTo(sourcePath, destPath)
}
