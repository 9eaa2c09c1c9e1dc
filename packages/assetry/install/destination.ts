import path from "node:path"
import { type AbsolutePath, type Entry, kindTraits } from "@assetry/core"
import { toAbsolutePath } from "@/io/fs"
import { expandPath } from "@/utils/expand"

/** Where an entry installs: its override (expanded), else the kind default. */
export function resolveDestination(
	entry: Pick<Entry, "dest" | "kind">,
	baseDir: AbsolutePath,
): AbsolutePath {
	const declared = entry.dest ?? kindTraits(entry.kind).defaultDest
	return toAbsolutePath(path.resolve(baseDir, expandPath(declared)))
}

/** Lockfile form of a destination: relative inside baseDir, absolute outside. */
export function formatRecordedDest(baseDir: AbsolutePath, destPath: AbsolutePath): string {
	const relative = path.relative(baseDir, destPath)
	if (
		relative === "" ||
		relative === ".." ||
		relative.startsWith(`..${path.sep}`) ||
		path.isAbsolute(relative)
	) {
		return destPath
	}
	return relative.split(path.sep).join("/")
}

export function resolveRecordedDest(baseDir: AbsolutePath, recorded: string): AbsolutePath {
	return toAbsolutePath(path.resolve(baseDir, recorded))
}

/** True when candidate is target or lies below it. */
export function isWithin(candidate: string, target: string): boolean {
	if (candidate === target) {
		return true
	}
	const relative = path.relative(target, candidate)
	return (
		relative.length > 0 &&
		relative !== ".." &&
		!relative.startsWith(`..${path.sep}`) &&
		!path.isAbsolute(relative)
	)
}
